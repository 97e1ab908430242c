import { isNullish, isString } from '../utils.js'
import { splitUri } from '../libs/splitUri.js'
import type { UriState } from './UriState.js'
import { type TPartAssignment, Part, CompoundPart } from './Part.js'
import type {
  SchemePart,
  UserPart,
  PasswordPart,
  HostPart,
  PortPart,
  PathPart,
  QueryPart,
  FragmentPart
} from './scalarParts.js'

const _hostPort = /^(\[[^\]]*\]|[^:]*)(?::([\s\S]*))?$/

/**
 * Разделяет `host:port`. В отличие от разбора исходной строки порт не проверяется - это сделает {@link PortPart}.
 */
function splitHostPort (value: string): [string, null | string] {
  const m = _hostPort.exec(value)
  if (!m) {
    return [value, null]
  }
  return [m[1] ?? '', m[2] ?? null]
}

/**
 * Учетные данные `user[:password]`. Без пользователя пароль не выводится.
 */
class AuthenticationPart extends CompoundPart {
  protected readonly _user: UserPart
  protected readonly _password: PasswordPart

  constructor(name: string, user: UserPart, password: PasswordPart) {
    super(name, [user, password])
    this._user = user
    this._password = password
  }

  render (state: UriState): string {
    const user = this._user.get(state)
    return user ? `${user}${this._password.render(state)}` : ''
  }

  protected _split (value: string): readonly TPartAssignment[] {
    const colon = value.indexOf(':')
    if (colon === -1) {
      return [[this._user, value], [this._password, null]]
    }
    return [[this._user, value.slice(0, colon)], [this._password, value.slice(colon + 1)]]
  }
}

/**
 * Учетные данные без пароля. Присваивание разбирается так же как у {@link AuthenticationPart}.
 */
class SafeAuthenticationPart extends AuthenticationPart {
  render (state: UriState): string {
    return this._user.get(state)
  }
}

/**
 * `authority` вида `auth@host:port`.
 */
class AuthorityPart extends CompoundPart {
  protected readonly _auth: AuthenticationPart
  protected readonly _host: HostPart
  protected readonly _port: PortPart

  constructor(name: string, auth: AuthenticationPart, host: HostPart, port: PortPart) {
    super(name, [auth, host, port])
    this._auth = auth
    this._host = host
    this._port = port
  }

  render (state: UriState): string {
    const auth = this._auth.render(state)
    return `${auth ? `${auth}@` : ''}${this._host.render(state)}${this._port.render(state)}`
  }

  protected _split (value: string): readonly TPartAssignment[] {
    const at = value.lastIndexOf('@')
    const [host, port] = splitHostPort(at === -1 ? value : value.slice(at + 1))
    return [
      [this._port, port],
      [this._host, host],
      [this._auth, at === -1 ? null : value.slice(0, at)]
    ]
  }
}

/**
 * `//authority/path` или только путь, если `authority` пуст. Путь, начинающийся с `//`, выводится после пустого
 * `authority`: `////a/b`.
 */
class HierarchicalPart extends CompoundPart {
  protected readonly _authority: AuthorityPart
  protected readonly _path: PathPart

  constructor(name: string, authority: AuthorityPart, path: PathPart) {
    super(name, [authority, path])
    this._authority = authority
    this._path = path
  }

  render (state: UriState): string {
    const authority = this._authority.render(state)
    const path = this._path.render(state)
    return (authority || path.startsWith('//')) ? `//${authority}${path}` : path
  }

  protected _split (value: string): readonly TPartAssignment[] {
    if (!value.startsWith('//')) {
      return [[this._authority, null], [this._path, value]]
    }
    const rest = value.slice(2)
    const slash = rest.indexOf('/')
    return slash === -1
      ? [[this._authority, rest], [this._path, null]]
      : [[this._authority, rest.slice(0, slash)], [this._path, rest.slice(slash)]]
  }
}

/**
 * `scheme://authority` без пути.
 */
class BasePart extends CompoundPart {
  protected readonly _scheme: SchemePart
  protected readonly _authority: AuthorityPart

  constructor(name: string, scheme: SchemePart, authority: AuthorityPart) {
    super(name, [scheme, authority])
    this._scheme = scheme
    this._authority = authority
  }

  render (state: UriState): string {
    const scheme = this._scheme.get(state)
    const authority = this._authority.render(state)
    const slashed = authority !== '' || (scheme !== '' && state.schemes.get(scheme).slashed)
    return `${scheme ? `${scheme}:` : ''}${slashed ? `//${authority}` : ''}`
  }

  protected _split (value: string): readonly TPartAssignment[] {
    const groups = splitUri(value)
    return [[this._authority, groups.authority], [this._scheme, groups.scheme]]
  }
}

/**
 * `host` и путь без схемы, учетных данных и порта: `example.com/foo/bar`.
 */
class SummaryPart extends CompoundPart {
  protected readonly _host: HostPart
  protected readonly _path: PathPart

  constructor(name: string, host: HostPart, path: PathPart) {
    super(name, [host, path])
    this._host = host
    this._path = path
  }

  render (state: UriState): string {
    return `${this._host.render(state)}${this._path.render(state)}`
  }

  protected _split (value: string): readonly TPartAssignment[] {
    const slash = value.indexOf('/')
    return slash === -1
      ? [[this._host, value], [this._path, null]]
      : [[this._host, value.slice(0, slash)], [this._path, value.slice(slash)]]
  }
}

/**
 * Строка `URI` целиком: `scheme://authority/path?query#fragment`.
 *
 * Присваивание строки не разбирает компоненты сразу: строка становится исходной для {@link UriState}, а компоненты
 * разбираются при первом обращении.
 */
class UriPart extends Part<string> {
  protected readonly _scheme: SchemePart
  protected readonly _authority: AuthorityPart
  protected readonly _path: PathPart
  protected readonly _query: QueryPart
  protected readonly _fragment: FragmentPart
  protected readonly _cached: boolean

  /**
   * @param cached Использовать кеш канонической строки {@link UriState.cache}. Кеш может принадлежать только одному
   *               варианту представления.
   */
  constructor(name: string, scheme: SchemePart, authority: AuthorityPart, path: PathPart, query: QueryPart, fragment: FragmentPart, cached: boolean) {
    super(name)
    this._scheme = scheme
    this._authority = authority
    this._path = path
    this._query = query
    this._fragment = fragment
    this._cached = cached
  }

  get (state: UriState): string {
    if (!this._cached) {
      return this.render(state)
    }
    return state.cache ?? state.updateCache(this.render(state))
  }

  set (state: UriState, value: unknown): void {
    if (isNullish(value)) {
      state.load(null)
      return
    }
    if (!isString(value)) {
      throw this._invalid(`Ожидается строка, получено typeof '${typeof value}'.`)
    }
    state.load(value)
  }

  delete (state: UriState): void {
    state.load(null)
  }

  render (state: UriState): string {
    const scheme = this._scheme.get(state)
    const authority = this._authority.render(state)
    const path = this._path.render(state)
    let result = scheme ? `${scheme}:` : ''
    if (authority !== '' || path.startsWith('//') || (scheme !== '' && state.schemes.get(scheme).slashed)) {
      result += `//${authority}`
    }
    return `${result}${path}${this._query.render(state)}${this._fragment.render(state)}`
  }
}

export {
  splitHostPort,
  AuthenticationPart,
  SafeAuthenticationPart,
  AuthorityPart,
  HierarchicalPart,
  BasePart,
  SummaryPart,
  UriPart
}
