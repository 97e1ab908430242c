import { describe, test, expect } from 'vitest'
import { InvalidValueError } from '../errors.js'
import { Scheme, SchemeRegistry, defaultSchemeRegistry } from '../configs/SchemeRegistry.js'
import { UriState } from './UriState.js'
import { QueryParams } from './QueryParams.js'
import { UriPath } from './UriPath.js'
import { splitHostPort } from './compoundParts.js'
import { uriParts, isUriPartName, uriComponentNames, uriResolveNames } from './uriParts.js'

function stateOf (uri: null | string, schemes: SchemeRegistry = defaultSchemeRegistry): UriState {
  const state = new UriState(schemes)
  state.load(uri)
  return state
}

describe('scalar parts', () => {
  test('компоненты разбираются при первом обращении', () => {
    const state = stateOf('HTTP://user:pw@Example.COM:8080/a?x=1#f')
    expect(state.read('host')).toBeUndefined()
    expect(uriParts.host.get(state)).toBe('example.com')
    expect(state.read('host')).toBe('example.com')
    expect(state.read('port')).toBeUndefined()
    expect(state.read('scheme')).toBeUndefined()
    expect(uriParts.scheme.get(state)).toBe('http')
    expect(uriParts.user.get(state)).toBe('user')
    expect(uriParts.password.get(state)).toBe('pw')
    expect(uriParts.port.get(state)).toBe(8080)
    expect(uriParts.path.get(state).toString()).toBe('/a')
    expect(uriParts.fragment.get(state)).toBe('f')
  })

  test('значения по умолчанию пустого URI', () => {
    const state = stateOf(null)
    expect(uriParts.scheme.get(state)).toBe('')
    expect(uriParts.host.get(state)).toBe('')
    expect(uriParts.port.get(state)).toBe(null)
    expect(uriParts.path.get(state).isTotalEmpty()).toBe(true)
    expect(uriParts.query.get(state)).toBeInstanceOf(QueryParams)
    expect(uriParts.uri.get(state)).toBe('')
  })

  test('нормализация схемы и хоста', () => {
    const state = stateOf(null)
    uriParts.scheme.set(state, 'HTTPS://')
    uriParts.host.set(state, 'Example.ORG')
    expect(uriParts.scheme.get(state)).toBe('https')
    expect(uriParts.host.get(state)).toBe('example.org')
    expect(uriParts.uri.get(state)).toBe('https://example.org')
  })

  test('недопустимая схема', () => {
    const state = stateOf('http://h/')
    try {
      uriParts.scheme.set(state, '1http')
      expect.unreachable()
    } catch (e) {
      expect(e).toBeInstanceOf(InvalidValueError)
      if (e instanceof InvalidValueError) {
        expect(e.detail.component).toBe('scheme')
      }
    }
    expect(uriParts.scheme.get(state)).toBe('http')
  })

  test('порт принимает число и строку из цифр', () => {
    const state = stateOf(null)
    uriParts.port.set(state, 443)
    expect(uriParts.port.get(state)).toBe(443)
    uriParts.port.set(state, ' 8080 ')
    expect(uriParts.port.get(state)).toBe(8080)
    uriParts.port.set(state, '')
    expect(uriParts.port.get(state)).toBe(null)
    uriParts.port.set(state, 0)
    expect(uriParts.port.get(state)).toBe(0)
  })

  test('недопустимый порт не изменяет значение и кеш', () => {
    const state = stateOf('http://h:81/')
    expect(uriParts.uri.get(state)).toBe('http://h:81/')
    expect(state.isFresh()).toBe(true)
    for (const value of [65536, -1, 1.5, '80a', '0x50', '99999', true]) {
      expect(() => uriParts.port.set(state, value)).toThrow(InvalidValueError)
    }
    expect(uriParts.port.get(state)).toBe(81)
    expect(state.isFresh()).toBe(true)
  })

  test('порт исходной строки вне диапазона остается частью хоста', () => {
    const state = stateOf('http://h:70000/')
    expect(uriParts.host.get(state)).toBe('h:70000')
    expect(uriParts.port.get(state)).toBe(null)
    expect(uriParts.uri.get(state)).toBe('http://h:70000/')
  })

  test('нецифровой порт исходной строки остается частью хоста', () => {
    const state = stateOf('http://h:abc/')
    expect(uriParts.host.get(state)).toBe('h:abc')
    expect(uriParts.port.get(state)).toBe(null)
  })

  test('путь принимает строку и UriPath', () => {
    const state = stateOf('http://h/a')
    uriParts.path.set(state, new UriPath('/b/c'))
    expect(uriParts.path.get(state).toString()).toBe('/b/c')
    uriParts.path.set(state, 'd')
    expect(uriParts.uri.get(state)).toBe('http://h/d')
    expect(() => uriParts.path.set(state, 42)).toThrow(InvalidValueError)
  })

  test('фрагмент без решетки', () => {
    const state = stateOf('http://h/')
    uriParts.fragment.set(state, '#top')
    expect(uriParts.fragment.get(state)).toBe('top')
    expect(uriParts.uri.get(state)).toBe('http://h/#top')
  })

  test('delete устанавливает значение по умолчанию', () => {
    const state = stateOf('http://u:p@h:81/a?x=1#f')
    uriParts.port.delete(state)
    uriParts.password.delete(state)
    uriParts.query.delete(state)
    uriParts.fragment.delete(state)
    expect(uriParts.uri.get(state)).toBe('http://u@h/a')
  })
})

describe('query part', () => {
  test('неразбираемая строка хранится непрозрачной', () => {
    const state = stateOf('http://h/?flag')
    expect(uriParts.query.get(state)).toBe('flag')
    expect(uriParts.uri.get(state)).toBe('http://h/?flag')
  })

  test('изменение параметров сбрасывает кеш', () => {
    const state = stateOf('http://h/?x=1')
    const query = uriParts.query.get(state)
    expect(uriParts.uri.get(state)).toBe('http://h/?x=1')
    expect(state.isFresh()).toBe(true)
    if (query instanceof QueryParams) {
      query.set('x', '2')
    }
    expect(state.isFresh()).toBe(false)
    expect(uriParts.uri.get(state)).toBe('http://h/?x=2')
  })

  test('замененные параметры больше не связаны с URI', () => {
    const state = stateOf('http://h/?x=1')
    const previous = uriParts.query.get(state)
    uriParts.query.set(state, { y: 2 })
    expect(uriParts.uri.get(state)).toBe('http://h/?y=2')
    if (previous instanceof QueryParams) {
      previous.set('x', '3')
    }
    expect(state.isFresh()).toBe(true)
    expect(uriParts.uri.get(state)).toBe('http://h/?y=2')
  })

  test('присвоенный экземпляр копируется', () => {
    const state = stateOf('http://h/')
    const own = new QueryParams([['a', '1']])
    uriParts.query.set(state, own)
    own.set('a', '2')
    expect(uriParts.uri.get(state)).toBe('http://h/?a=1')
  })

  test('строка с вопросительным знаком', () => {
    const state = stateOf('http://h/')
    uriParts.query.set(state, '?a=1&b=2')
    expect(uriParts.uri.get(state)).toBe('http://h/?a=1&b=2')
    expect(() => uriParts.query.set(state, 42)).toThrow(InvalidValueError)
  })
})

describe('compound parts', () => {
  test('splitHostPort', () => {
    expect(splitHostPort('example.com:80')).toStrictEqual(['example.com', '80'])
    expect(splitHostPort('example.com')).toStrictEqual(['example.com', null])
    expect(splitHostPort('[::1]:81')).toStrictEqual(['[::1]', '81'])
    expect(splitHostPort('[::1]')).toStrictEqual(['[::1]', null])
  })

  test('auth и safeAuth', () => {
    const state = stateOf('http://user:pw@h/')
    expect(uriParts.auth.get(state)).toBe('user:pw')
    expect(uriParts.safeAuth.get(state)).toBe('user')
    uriParts.safeAuth.set(state, 'admin:secret')
    expect(uriParts.user.get(state)).toBe('admin')
    expect(uriParts.password.get(state)).toBe('secret')
    uriParts.auth.set(state, 'guest')
    expect(uriParts.password.get(state)).toBe('')
    expect(uriParts.auth.get(state)).toBe('guest')
  })

  test('пароль без пользователя не выводится', () => {
    const state = stateOf('http://h/')
    uriParts.password.set(state, 'test-secret')
    expect(uriParts.auth.get(state)).toBe('')
    expect(uriParts.authority.get(state)).toBe('h')
  })

  test('authority разбирается на учетные данные, хост и порт', () => {
    const state = stateOf('http://h/')
    uriParts.authority.set(state, 'u:p@[::1]:81')
    expect(uriParts.user.get(state)).toBe('u')
    expect(uriParts.password.get(state)).toBe('p')
    expect(uriParts.host.get(state)).toBe('[::1]')
    expect(uriParts.port.get(state)).toBe(81)
    expect(uriParts.authority.get(state)).toBe('u:p@[::1]:81')
    expect(uriParts.safeAuthority.get(state)).toBe('u@[::1]:81')

    uriParts.authority.set(state, 'other.org')
    expect(uriParts.user.get(state)).toBe('')
    expect(uriParts.password.get(state)).toBe('')
    expect(uriParts.port.get(state)).toBe(null)
    expect(uriParts.uri.get(state)).toBe('http://other.org/')
  })

  test('ошибка в authority не изменяет компоненты', () => {
    const state = stateOf('http://user:pw@example.com:8080/')
    expect(uriParts.uri.get(state)).toBe('http://user:pw@example.com:8080/')
    expect(() => uriParts.authority.set(state, 'a@h:99999')).toThrow(InvalidValueError)
    expect(() => uriParts.authority.set(state, 'a@h:port')).toThrow(InvalidValueError)
    expect(state.isFresh()).toBe(true)
    expect(uriParts.user.get(state)).toBe('user')
    expect(uriParts.host.get(state)).toBe('example.com')
    expect(uriParts.port.get(state)).toBe(8080)
  })

  test('hierarchical', () => {
    const state = stateOf('http://example.com/a')
    expect(uriParts.hierarchical.get(state)).toBe('//example.com/a')
    uriParts.hierarchical.set(state, '//other.org/x/y')
    expect(uriParts.host.get(state)).toBe('other.org')
    expect(uriParts.path.get(state).toString()).toBe('/x/y')
    uriParts.hierarchical.set(state, 'rel/path')
    expect(uriParts.authority.get(state)).toBe('')
    expect(uriParts.hierarchical.get(state)).toBe('rel/path')
  })

  test('путь с // выводится после пустого authority', () => {
    const state = stateOf(null)
    uriParts.path.set(state, '//a/b')
    expect(uriParts.hierarchical.get(state)).toBe('////a/b')
    expect(uriParts.uri.get(state)).toBe('////a/b')
    const reparsed = stateOf(uriParts.uri.get(state))
    expect(uriParts.authority.get(reparsed)).toBe('')
    expect(uriParts.path.get(reparsed).toString()).toBe('//a/b')
    uriParts.hierarchical.set(reparsed, '////c')
    expect(uriParts.path.get(reparsed).toString()).toBe('//c')
  })

  test('base', () => {
    const state = stateOf('http://example.com:8080/a?x=1')
    expect(uriParts.base.get(state)).toBe('http://example.com:8080')
    uriParts.base.set(state, 'https://h2')
    expect(uriParts.uri.get(state)).toBe('https://h2/a?x=1')
    expect(uriParts.base.get(stateOf('mailto:joe@example.com'))).toBe('mailto:')
  })

  test('summary', () => {
    const state = stateOf('http://user:pw@example.com:8080/a/b?x=1')
    expect(uriParts.summary.get(state)).toBe('example.com/a/b')
    uriParts.summary.set(state, 'host.org/p')
    expect(uriParts.uri.get(state)).toBe('http://user:pw@host.org:8080/p?x=1')
    uriParts.summary.set(state, 'bare.org')
    expect(uriParts.uri.get(state)).toBe('http://user:pw@bare.org:8080?x=1')
  })

  test('uri и safeUri', () => {
    const state = stateOf('http://user:pw@h/')
    expect(uriParts.safeUri.get(state)).toBe('http://user@h/')
    uriParts.uri.set(state, 'ftp://files.example.com/pub')
    expect(state.read('host')).toBeUndefined()
    expect(uriParts.host.get(state)).toBe('files.example.com')
    uriParts.uri.delete(state)
    expect(uriParts.uri.get(state)).toBe('')
    expect(() => uriParts.uri.set(state, 1)).toThrow(InvalidValueError)
  })

  test('иерархические схемы выводят // при пустом authority', () => {
    expect(uriParts.uri.get(stateOf('file:///etc/hosts'))).toBe('file:///etc/hosts')
    expect(uriParts.uri.get(stateOf('urn:isbn:123'))).toBe('urn:isbn:123')
    const custom = new SchemeRegistry([new Scheme('app', true)])
    const state = stateOf(null, custom)
    uriParts.scheme.set(state, 'app')
    uriParts.path.set(state, '/home')
    expect(uriParts.uri.get(state)).toBe('app:///home')
  })

  test('относительный путь после authority получает слеш', () => {
    const state = stateOf('http://h')
    uriParts.path.set(state, 'x')
    expect(uriParts.path.get(state).toString()).toBe('/x')
    expect(uriParts.uri.get(state)).toBe('http://h/x')
    expect(uriParts.summary.get(state)).toBe('h/x')
    uriParts.host.delete(state)
    uriParts.scheme.delete(state)
    expect(uriParts.path.get(state).toString()).toBe('x')
  })
})

describe('component names', () => {
  test('isUriPartName', () => {
    expect(isUriPartName('authority')).toBe(true)
    expect(isUriPartName('toString')).toBe(false)
    expect(isUriPartName('netloc')).toBe(false)
  })

  test('имена конструктора и resolve', () => {
    expect(uriComponentNames.has('safeAuth')).toBe(true)
    expect(uriComponentNames.has('uri')).toBe(false)
    expect(uriResolveNames.has('authority')).toBe(true)
    expect(uriResolveNames.has('safeAuthority')).toBe(false)
  })
})
