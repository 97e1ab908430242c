import type { Nullish } from '../types.js'
import type { UriPath } from './UriPath.js'
import type { TQueryOptions } from './QueryParams.js'
import {
  SchemePart,
  UserPart,
  PasswordPart,
  HostPart,
  PortPart,
  PathPart,
  QueryPart,
  FragmentPart
} from './scalarParts.js'
import {
  AuthenticationPart,
  SafeAuthenticationPart,
  AuthorityPart,
  HierarchicalPart,
  BasePart,
  SummaryPart,
  UriPart
} from './compoundParts.js'

const scheme = new SchemePart()
const user = new UserPart()
const password = new PasswordPart()
const host = new HostPart()
const port = new PortPart()
const path = new PathPart(scheme, user, host, port)
const query = new QueryPart()
const fragment = new FragmentPart()

const auth = new AuthenticationPart('auth', user, password)
const safeAuth = new SafeAuthenticationPart('safeAuth', user, password)
const authority = new AuthorityPart('authority', auth, host, port)
const safeAuthority = new AuthorityPart('safeAuthority', safeAuth, host, port)

/**
 * Общие для всех экземпляров `Uri` аксессоры компонентов.
 */
const uriParts = Object.freeze({
  scheme,
  user,
  password,
  host,
  port,
  path,
  query,
  fragment,
  auth,
  safeAuth,
  authority,
  safeAuthority,
  hierarchical: new HierarchicalPart('hierarchical', authority, path),
  base: new BasePart('base', scheme, authority),
  uri: new UriPart('uri', scheme, authority, path, query, fragment, true),
  safeUri: new UriPart('safeUri', scheme, safeAuthority, path, query, fragment, false),
  summary: new SummaryPart('summary', host, path)
} as const)

type TUriPartName = keyof typeof uriParts

function isUriPartName (name: string): name is TUriPartName {
  return Object.prototype.hasOwnProperty.call(uriParts, name)
}

/**
 * Значения компонентов, принимаемые конструктором `Uri`.
 *
 * `undefined | null` устанавливают значение по умолчанию.
 */
type TUriComponentsOptions = {
  scheme?: Nullish | string
  user?: Nullish | string
  password?: Nullish | string
  host?: Nullish | string
  port?: Nullish | number | string
  path?: Nullish | string | UriPath
  query?: Nullish | string | TQueryOptions
  fragment?: Nullish | string
  auth?: Nullish | string
  safeAuth?: Nullish | string
  authority?: Nullish | string
  safeAuthority?: Nullish | string
}

/**
 * Значения компонентов, принимаемые {@link Uri.resolve()}: только основные компоненты.
 */
type TUriResolveOptions = Pick<TUriComponentsOptions,
  'scheme' | 'user' | 'password' | 'host' | 'port' | 'path' | 'query' | 'fragment' | 'authority'>

/**
 * Имена компонентов, допустимые в {@link TUriComponentsOptions}.
 */
const uriComponentNames: ReadonlySet<string> = new Set<keyof TUriComponentsOptions>([
  'scheme', 'user', 'password', 'host', 'port', 'path', 'query', 'fragment',
  'auth', 'safeAuth', 'authority', 'safeAuthority'
])

/**
 * Имена компонентов, допустимые в {@link TUriResolveOptions}.
 */
const uriResolveNames: ReadonlySet<string> = new Set<keyof TUriResolveOptions>([
  'scheme', 'user', 'password', 'host', 'port', 'path', 'query', 'fragment', 'authority'
])

export {
  uriParts,
  type TUriPartName,
  isUriPartName,
  type TUriComponentsOptions,
  type TUriResolveOptions,
  uriComponentNames,
  uriResolveNames
}
