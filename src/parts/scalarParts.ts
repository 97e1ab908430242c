import { type TPortNumber, isPortNumber } from '../types.js'
import { isString } from '../utils.js'
import type { TUriComponents, UriState } from './UriState.js'
import { ScalarPart } from './Part.js'
import { UriPath } from './UriPath.js'
import { QueryParams, normalizeQueryOptions } from './QueryParams.js'

const _scheme = /^[a-z][a-z0-9+.-]*$/
const _schemeSuffix = /:(\/\/)?$/
const _digits = /^\d+$/
const _pathDelimiter = /[?#]/g

/**
 * Схема в нижнем регистре. Принимает `'http'`, `'HTTP:'` и `'http://'`.
 */
class SchemePart extends ScalarPart<'scheme'> {
  constructor() {
    super('scheme')
  }

  protected _load (state: UriState): string {
    return (state.groups.scheme ?? '').toLowerCase()
  }

  protected _normalize (value: unknown): string {
    if (!isString(value)) {
      throw this._invalid(`Схема должна быть строкой, получено typeof '${typeof value}'.`)
    }
    const scheme = value.replace(_schemeSuffix, '').toLowerCase()
    if (scheme !== '' && !_scheme.test(scheme)) {
      throw this._invalid(`Недопустимое имя схемы '${value}'.`)
    }
    return scheme
  }

  protected _empty (): string {
    return ''
  }

  render (state: UriState): string {
    const scheme = this.get(state)
    return scheme ? `${scheme}:` : ''
  }
}

/**
 * Общая реализация строковых компонентов без специальной проверки.
 */
abstract class TextPart<K extends 'user' | 'password' | 'host' | 'fragment'> extends ScalarPart<K> {
  protected _text (value: unknown): string {
    if (isString(value)) {
      return value
    }
    throw this._invalid(`Ожидается строка, получено typeof '${typeof value}'.`)
  }

  protected _empty (): string {
    return ''
  }
}

class UserPart extends TextPart<'user'> {
  constructor() {
    super('user')
  }

  protected _load (state: UriState): string {
    return state.authority.user ?? ''
  }

  protected _normalize (value: unknown): string {
    return this._text(value)
  }

  render (state: UriState): string {
    return this.get(state)
  }
}

class PasswordPart extends TextPart<'password'> {
  constructor() {
    super('password')
  }

  protected _load (state: UriState): string {
    return state.authority.password ?? ''
  }

  protected _normalize (value: unknown): string {
    return this._text(value)
  }

  render (state: UriState): string {
    const password = this.get(state)
    return password ? `:${password}` : ''
  }
}

/**
 * Хост в нижнем регистре. IPv6 литерал хранится вместе со скобками `[::1]`.
 */
class HostPart extends TextPart<'host'> {
  constructor() {
    super('host')
  }

  protected _load (state: UriState): string {
    return state.authority.host.toLowerCase()
  }

  protected _normalize (value: unknown): string {
    return this._text(value).toLowerCase()
  }

  render (state: UriState): string {
    return this.get(state)
  }
}

/**
 * Фрагмент без `#`.
 */
class FragmentPart extends TextPart<'fragment'> {
  constructor() {
    super('fragment')
  }

  protected _load (state: UriState): string {
    return state.groups.fragment ?? ''
  }

  protected _normalize (value: unknown): string {
    const fragment = this._text(value)
    return fragment.startsWith('#') ? fragment.slice(1) : fragment
  }

  render (state: UriState): string {
    const fragment = this.get(state)
    return fragment ? `#${fragment}` : ''
  }
}

/**
 * Порт - целое в диапазоне `[0, 65535]` или `null`.
 *
 * Строка допускается только из десятичных цифр, пустая строка эквивалентна `null`.
 */
class PortPart extends ScalarPart<'port'> {
  constructor() {
    super('port')
  }

  protected _load (state: UriState): null | TPortNumber {
    const port = state.authority.port
    return port === null ? null : this._normalize(port)
  }

  protected _normalize (value: unknown): null | TPortNumber {
    if (isPortNumber(value)) {
      return value
    }
    if (isString(value)) {
      const text = value.trim()
      if (text === '') {
        return null
      }
      const port = _digits.test(text) ? Number.parseInt(text, 10) : Number.NaN
      if (isPortNumber(port)) {
        return port
      }
      throw this._invalid(`Порт должен быть целым числом в диапазоне [0, 65535], получено '${value}'.`)
    }
    throw this._invalid(`Порт должен быть целым числом в диапазоне [0, 65535], получено ${typeof value === 'number' ? value : `typeof '${typeof value}'`}.`)
  }

  protected _empty (): null {
    return null
  }

  render (state: UriState): string {
    const port = this.get(state)
    return port === null ? '' : `:${port}`
  }
}

/**
 * Путь {@link UriPath}. Принимает строку или экземпляр {@link UriPath}.
 *
 * Рядом с непустым `authority` или после схемы со слешами относительный путь читается как абсолютный: иначе
 * каноническая строка не совпала бы с хранимым путем. Символы `?` и `#` экранируются при сохранении.
 */
class PathPart extends ScalarPart<'path'> {
  protected readonly _scheme: SchemePart
  protected readonly _user: UserPart
  protected readonly _host: HostPart
  protected readonly _port: PortPart

  constructor(scheme: SchemePart, user: UserPart, host: HostPart, port: PortPart) {
    super('path')
    this._scheme = scheme
    this._user = user
    this._host = host
    this._port = port
  }

  protected _rooted (state: UriState): boolean {
    if (this._user.get(state) !== '' || this._host.get(state) !== '' || this._port.get(state) !== null) {
      return true
    }
    const scheme = this._scheme.get(state)
    return scheme !== '' && state.schemes.get(scheme).slashed
  }

  override get (state: UriState): UriPath {
    const path = super.get(state)
    if (path.isAbsolute() || path.isTotalEmpty() || !this._rooted(state)) {
      return path
    }
    return new UriPath({ ...path.getParsedUriPath(), hasStartSlash: true })
  }

  protected _load (state: UriState): UriPath {
    return new UriPath(state.groups.path)
  }

  protected _normalize (value: unknown): UriPath {
    if (value instanceof UriPath) {
      return value
    }
    if (isString(value)) {
      return new UriPath(value.replace(_pathDelimiter, (c) => encodeURIComponent(c)))
    }
    throw this._invalid(`Путь должен быть строкой или UriPath, получено typeof '${typeof value}'.`)
  }

  protected _empty (): UriPath {
    return new UriPath()
  }

  render (state: UriState): string {
    return this.get(state).toString()
  }
}

/**
 * Строка запроса в виде {@link QueryParams} или непрозрачной строки.
 *
 * `#` в присваиваемой строке сохраняется как `%23`.
 *
 * Хранимый {@link QueryParams} привязан к владельцу: его изменение сбрасывает кеш канонической строки.
 */
class QueryPart extends ScalarPart<'query'> {
  constructor() {
    super('query')
  }

  /**
   * Разбирает строку запроса в набор параметров или оставляет ее непрозрачной.
   *
   * @param raw Строка запроса без `?`.
   */
  static parse (raw: string): QueryParams | string {
    return QueryParams.parse(raw) ?? raw
  }

  protected _load (state: UriState): QueryParams | string {
    return QueryPart.parse(state.groups.query ?? '')
  }

  protected _normalize (value: unknown): QueryParams | string {
    if (isString(value)) {
      return QueryPart.parse((value.startsWith('?') ? value.slice(1) : value).replaceAll('#', '%23'))
    }
    const query = normalizeQueryOptions(value)
    if (!query) {
      throw this._invalid(`Строка запроса должна быть строкой, QueryParams, URLSearchParams, массивом пар или объектом, получено typeof '${typeof value}'.`)
    }
    return query
  }

  protected _empty (): QueryParams {
    return new QueryParams()
  }

  protected override _store (state: UriState, value: TUriComponents['query']): void {
    const previous = state.read('query')
    if (previous instanceof QueryParams && previous !== value) {
      previous._changeListener(null)
    }
    if (value instanceof QueryParams) {
      value._changeListener(() => state.invalidate())
    }
    super._store(state, value)
  }

  render (state: UriState): string {
    const query = this.get(state).toString()
    return query ? `?${query}` : ''
  }
}

export {
  SchemePart,
  TextPart,
  UserPart,
  PasswordPart,
  HostPart,
  FragmentPart,
  PortPart,
  PathPart,
  QueryPart
}
