import { describe, test, expect, vi, afterEach } from 'vitest'
import { Scheme, SchemeRegistry, defaultSchemeRegistry } from './SchemeRegistry.js'
import { ConfigureError } from '../errors.js'

afterEach(() => {
  vi.restoreAllMocks()
})

describe('Scheme', () => {
  test('имя приводится к нижнему регистру', () => {
    const scheme = new Scheme('HTTP', true)
    expect(scheme.name).toBe('http')
    expect(scheme.slashed).toBe(true)
    expect(`${scheme}`).toBe('http')
  })
})

describe('SchemeRegistry', () => {
  test('регистрирует и возвращает схемы', () => {
    const registry = new SchemeRegistry([new Scheme('app', true)])
    expect(registry.has('app')).toBe(true)
    expect(registry.get('APP').slashed).toBe(true)
    expect([...registry.keys]).toStrictEqual(['app'])
  })

  test('незарегистрированная схема не иерархическая', () => {
    const registry = new SchemeRegistry()
    const scheme = registry.get('Mailto')
    expect(scheme.name).toBe('mailto')
    expect(scheme.slashed).toBe(false)
    expect(registry.has('mailto')).toBe(false)
  })

  test('повторная регистрация игнорируется с предупреждением', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => { /**/ })
    const registry = new SchemeRegistry([new Scheme('app', true)])
    expect(registry.register(new Scheme('app', false))).toBe(false)
    expect(registry.get('app').slashed).toBe(true)
    expect(warn).toHaveBeenCalledTimes(1)
    expect(warn).toHaveBeenCalledWith('[Uri.SchemeRegistry] Ключ "app" уже зарегистрирован.')
    expect(registry.register(new Scheme('web', true))).toBe(true)
    expect([...registry.keys]).toStrictEqual(['app', 'web'])
  })

  test('замороженный реестр', () => {
    const registry = new SchemeRegistry()
    registry.freeze()
    expect(registry.frozen).toBe(true)
    try {
      registry.register(new Scheme('app', true))
      expect.unreachable()
    } catch (e) {
      expect(e).toBeInstanceOf(ConfigureError)
      if (e instanceof ConfigureError) {
        expect(e.detail.message).toBe('SchemeRegistry заморожен и не может зарегистрировать ключ "app".')
      }
    }
    expect(registry.has('app')).toBe(false)
  })

  test('недопустимое имя схемы', () => {
    const registry = new SchemeRegistry()
    expect(() => registry.register(new Scheme('1app', true))).toThrow(ConfigureError)
    expect(() => registry.register(new Scheme('', true))).toThrow(ConfigureError)
  })

  test('реестр по умолчанию', () => {
    expect(defaultSchemeRegistry.get('https').slashed).toBe(true)
    expect(defaultSchemeRegistry.get('file').slashed).toBe(true)
    expect(defaultSchemeRegistry.get('urn').slashed).toBe(false)
  })
})
