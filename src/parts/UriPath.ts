import { isNonemptyString, isNullish, isString } from '../utils.js'

/**
 * Разобранный путь `URI`.
 */
type TParsedUriPath = {
  /**
   * Путь абсолютный - начинается со слеша.
   */
  hasStartSlash: boolean
  /**
   * Путь заканчивается слешем после последнего сегмента.
   */
  hasEndSlash: boolean
  /**
   * Сегменты без разделителей. Пустые сегменты `a//b` сохраняются.
   */
  segments: readonly string[]
}

/**
 * Разбирает строку пути на сегменты.
 *
 * В отличие от путей файловой системы повторные слеши не схлопываются: `'/a//b/'` разбирается на `['a', '', 'b']`
 * и собирается обратно в ту же строку.
 *
 * @param path Строка пути.
 */
function parseUriPath (path: undefined | null | string): TParsedUriPath {
  if (!isNonemptyString(path)) {
    return { hasStartSlash: false, hasEndSlash: false, segments: Object.freeze([]) }
  }
  const hasStartSlash = path.startsWith('/')
  let rest = hasStartSlash ? path.slice(1) : path
  // Единственный слеш '/' является началом, а не концом пути
  const hasEndSlash = rest.length > 0 && rest.endsWith('/')
  if (hasEndSlash) {
    rest = rest.slice(0, -1)
  }
  return {
    hasStartSlash,
    hasEndSlash,
    segments: Object.freeze(rest === '' ? [] : rest.split('/'))
  }
}

/**
 * Преобразует компоненты пути полученные {@link parseUriPath} обратно к строке пути.
 */
function parsedUriPathToString (path: TParsedUriPath): string {
  const startSlash = path.hasStartSlash ? '/' : ''
  const endSlash = path.hasEndSlash ? '/' : ''
  return `${startSlash}${path.segments.join('/')}${endSlash}`
}

/**
 * Неизменяемый путь `URI`: последовательность сегментов, признак абсолютного пути и завершающего слеша.
 */
class UriPath {
  protected readonly _hasStartSlash: boolean
  protected readonly _hasEndSlash: boolean
  protected readonly _segments: readonly string[]
  protected _string: null | string = null

  constructor(path?: undefined | null | string | TParsedUriPath) {
    const parsed = (isNullish(path) || isString(path)) ? parseUriPath(path) : path
    this._hasStartSlash = parsed.hasStartSlash
    this._hasEndSlash = parsed.hasEndSlash
    this._segments = Object.isFrozen(parsed.segments) ? parsed.segments : Object.freeze([...parsed.segments])
  }

  /**
   * Есть ли у пути первый слеш.
   */
  get hasStartSlash (): boolean {
    return this._hasStartSlash
  }

  /**
   * Есть ли у пути последний слеш.
   */
  get hasEndSlash (): boolean {
    return this._hasEndSlash
  }

  get segments (): readonly string[] {
    return this._segments
  }

  /**
   * Последний сегмент или пустая строка.
   */
  get name (): string {
    return this._segments[this._segments.length - 1] ?? ''
  }

  isAbsolute (): boolean {
    return this._hasStartSlash
  }

  /**
   * У пути нет ни одного сегмента.
   *
   * Это не означает что путь не имеет слеша. Для проверки слеша следует использовать {@link hasStartSlash}.
   */
  isEmpty (): boolean {
    return this._segments.length === 0
  }

  /**
   * Строковое представление пути пустое.
   */
  isTotalEmpty (): boolean {
    return this._segments.length === 0 && !this._hasStartSlash && !this._hasEndSlash
  }

  getParsedUriPath (): TParsedUriPath {
    return {
      hasStartSlash: this._hasStartSlash,
      hasEndSlash: this._hasEndSlash,
      segments: this._segments
    }
  }

  /**
   * Возвращает новый путь с добавленными сегментами.
   *
   * Абсолютный аргумент заменяет все, что было до него, пустая строка пропускается. Завершающий слеш результата
   * определяется последним добавленным путем.
   *
   * @example
   * ```ts
   * new UriPath('/a/b').join('c', 'd/') // '/a/b/c/d/'
   * new UriPath('/a/b').join('/c')      // '/c'
   * ```
   */
  join (...paths: (string | UriPath)[]): UriPath {
    let result = this.getParsedUriPath()
    for (const item of paths) {
      const other = (item instanceof UriPath) ? item.getParsedUriPath() : parseUriPath(item)
      if (other.hasStartSlash) {
        result = other
      }
      else if (other.segments.length > 0) {
        result = {
          hasStartSlash: result.hasStartSlash,
          hasEndSlash: other.hasEndSlash,
          segments: Object.freeze([...result.segments, ...other.segments])
        }
      }
    }
    return new UriPath(result)
  }

  equals (other: string | UriPath): boolean {
    return this.toString() === other.toString()
  }

  toString (): string {
    if (this._string === null) {
      this._string = parsedUriPathToString(this)
    }
    return this._string
  }
}

export {
  type TParsedUriPath,
  parseUriPath,
  parsedUriPathToString,
  UriPath
}
