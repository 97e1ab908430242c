import type { TPortNumber } from '../types.js'
import {
  type TUriGroups,
  type TAuthorityGroups,
  emptyGroups,
  splitUri,
  splitAuthority
} from '../libs/splitUri.js'
import type { SchemeRegistry } from '../configs/SchemeRegistry.js'
import type { UriPath } from './UriPath.js'
import { QueryParams } from './QueryParams.js'

/**
 * Типизированные значения скалярных компонентов `URI`.
 */
type TUriComponents = {
  scheme: string
  user: string
  password: string
  host: string
  port: null | TPortNumber
  path: UriPath
  /**
   * Набор параметров или непрозрачная строка, если строка запроса не разбирается как `key=value&...`.
   */
  query: QueryParams | string
  fragment: string
}

type TUriComponentName = keyof TUriComponents

/**
 * Слоты одного `URI`: исходная строка, разобранные компоненты и кеш канонической строки.
 *
 * Компонент без значения в слоте еще не разобран и будет прочитан из групп исходной строки при первом обращении.
 * Кеш канонической строки находится в одном из двух состояний: `null` - устарел, строка - актуален.
 *
 * **Note:** Экземпляр не синхронизирован. Даже чтение может изменить слоты (ленивый разбор и заполнение кеша).
 */
class UriState {
  protected readonly _schemes: SchemeRegistry
  protected _cache: null | string = null
  protected _groups: Readonly<TUriGroups> = emptyGroups
  protected _authority: null | TAuthorityGroups = null
  protected _components: Partial<TUriComponents> = {}

  constructor(schemes: SchemeRegistry) {
    this._schemes = schemes
  }

  get schemes (): SchemeRegistry {
    return this._schemes
  }

  /**
   * Кеш канонической строки или `null`, если он устарел.
   */
  get cache (): null | string {
    return this._cache
  }

  isFresh (): boolean {
    return this._cache !== null
  }

  updateCache (uri: string): string {
    this._cache = uri
    return uri
  }

  invalidate (): void {
    this._cache = null
  }

  /**
   * Заменяет исходную строку и сбрасывает все компоненты в неразобранное состояние.
   *
   * @param uri Строка или `null` для пустого `URI`.
   */
  load (uri: null | string): void {
    const query = this._components.query
    if (query instanceof QueryParams) {
      query._changeListener(null)
    }
    this._groups = uri === null ? emptyGroups : splitUri(uri)
    this._authority = null
    this._components = {}
    this._cache = null
  }

  /**
   * Группы верхнего уровня исходной строки.
   */
  get groups (): Readonly<TUriGroups> {
    return this._groups
  }

  /**
   * Лениво разобранные группы `authority` исходной строки.
   */
  get authority (): Readonly<TAuthorityGroups> {
    if (!this._authority) {
      this._authority = splitAuthority(this._groups.authority ?? '')
    }
    return this._authority
  }

  read<K extends TUriComponentName> (name: K): undefined | TUriComponents[K] {
    return this._components[name]
  }

  write<K extends TUriComponentName> (name: K, value: TUriComponents[K]): void {
    this._components[name] = value
  }
}

export {
  type TUriComponents,
  type TUriComponentName,
  UriState
}
