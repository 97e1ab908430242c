export {
  Scheme,
  SchemeRegistry,
  defaultSlashedSchemes,
  defaultSchemeRegistry
} from './configs/SchemeRegistry.js'
export {
  type TLinkValue,
  LinkableLike
} from './interfaces/LinkableLike.js'
export {
  UriMaterializerLike
} from './interfaces/UriMaterializerLike.js'
export {
  RegistryBase
} from './libs/RegistryBase.js'
export {
  removeDotSegments,
  mergePaths,
  resolveReference
} from './libs/resolveReference.js'
export {
  type TUriGroups,
  type TAuthorityGroups,
  splitUri,
  splitAuthority,
  joinUriGroups
} from './libs/splitUri.js'
export {
  splitHostPort,
  AuthenticationPart,
  SafeAuthenticationPart,
  AuthorityPart,
  HierarchicalPart,
  BasePart,
  SummaryPart,
  UriPart
} from './parts/compoundParts.js'
export {
  Part,
  ScalarPart,
  type TPartAssignment,
  CompoundPart
} from './parts/Part.js'
export {
  type TQueryValue,
  type TQueryOptions,
  QueryParams
} from './parts/QueryParams.js'
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
} from './parts/scalarParts.js'
export {
  uriParts,
  type TUriPartName,
  type TUriComponentsOptions,
  type TUriResolveOptions
} from './parts/uriParts.js'
export {
  type TParsedUriPath,
  parseUriPath,
  UriPath
} from './parts/UriPath.js'
export {
  type TUriComponents,
  type TUriComponentName,
  UriState
} from './parts/UriState.js'
export {
  type TErrorName,
  isErrorName,
  type IErrorDetail,
  type IErrorLike,
  errorDetails,
  UriError,
  ConfigureError,
  UnknownComponentError,
  InvalidStateError,
  InvalidValueError
} from './errors.js'
export {
  type Nullish,
  type TPortNumber,
  isPortNumber
} from './types.js'
export {
  type TUriSource,
  Uri
} from './Uri.js'
