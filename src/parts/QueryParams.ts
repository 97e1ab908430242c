import { isString, isPlainObject } from '../utils.js'

/**
 * Допустимое значение параметра. Значения приводятся к строке функцией {@link valueToString}.
 */
type TQueryValue = undefined | null | string | number | boolean

/**
 * Необработанные параметры строки запроса `?foo=bar` в виде структуры.
 */
type TQueryOptions =
  QueryParams |
  URLSearchParams |
  (readonly (readonly [string, TQueryValue])[]) |
  Record<string, TQueryValue | readonly TQueryValue[]>

const _plus = /\+/g

function valueToString (value: unknown): string {
  if (isString(value)) {
    return value
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value.toString(10)
  }
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false'
  }
  return ''
}

/**
 * Декодирует ключ или значение формата `application/x-www-form-urlencoded` или возвращает `null`, если в строке есть
 * неверная последовательность `%XX`.
 */
function decodeFormComponent (value: string): null | string {
  try {
    return decodeURIComponent(value.replace(_plus, ' '))
  } catch (_) {
    return null
  }
}

/**
 * Валидирует элементы массива пар и приводит к виду `[string, string][]`.
 *
 * @param queryArray Массив пар параметров.
 */
function normalizeArrayQueryParams (queryArray: readonly unknown[]): [string, string][] {
  const array: [string, string][] = []
  for (const item of queryArray) {
    if (Array.isArray(item) && item.length === 2 && isString(item[0])) {
      array.push([item[0], valueToString(item[1])])
    }
  }
  return array
}

/**
 * Валидирует свойства объекта и приводит к виду `[string, string][]`.
 *
 * Массив в значении свойства дает повторяющийся ключ.
 *
 * @param queryObject Объект с параметрами.
 */
function normalizeObjectQueryParams (queryObject: object): [string, string][] {
  const array: [string, string][] = []
  for (const [key, value] of Object.entries(queryObject)) {
    if (Array.isArray(value)) {
      for (const item of value) {
        array.push([key, valueToString(item)])
      }
    }
    else {
      array.push([key, valueToString(value)])
    }
  }
  return array
}

/**
 * Приводит структуру параметров к {@link QueryParams} или возвращает `null` для неподдерживаемого типа.
 *
 * @param value Один из вариантов {@link TQueryOptions}.
 */
function normalizeQueryOptions (value: unknown): null | QueryParams {
  if (value instanceof QueryParams) {
    return value.clone()
  }
  if (value instanceof URLSearchParams) {
    return new QueryParams(value)
  }
  if (Array.isArray(value)) {
    return new QueryParams(normalizeArrayQueryParams(value))
  }
  if (isPlainObject(value)) {
    return new QueryParams(normalizeObjectQueryParams(value))
  }
  return null
}

/**
 * Параметры строки запроса в виде отображения ключа на упорядоченный список значений.
 *
 * Ключи уникальны и сохраняют порядок первого появления. Итерация по экземпляру перебирает ключи.
 */
class QueryParams implements Iterable<string> {
  protected readonly _items = new Map<string, string[]>()
  protected _listener: null | (() => void) = null

  /**
   * @param pairs Пары `[key, value]`, повторные ключи накапливают значения.
   */
  constructor(pairs?: undefined | null | Iterable<readonly [string, string]>) {
    if (pairs) {
      for (const [key, value] of pairs) {
        this._append(key, value)
      }
    }
  }

  /**
   * Разбирает строку формата `key=value&key=value`.
   *
   * Возвращает `null`, если строка не соответствует формату: есть пара без `=` или неверная последовательность `%XX`.
   * Пустые пары `a=1&&b=2` пропускаются, пустая строка дает пустой набор.
   *
   * @param raw Строка запроса без `?`.
   */
  static parse (raw: string): null | QueryParams {
    const query = new QueryParams()
    for (const pair of raw.split('&')) {
      if (pair === '') {
        continue
      }
      const eq = pair.indexOf('=')
      if (eq === -1) {
        return null
      }
      const key = decodeFormComponent(pair.slice(0, eq))
      const value = decodeFormComponent(pair.slice(eq + 1))
      if (key === null || value === null) {
        return null
      }
      query._append(key, value)
    }
    return query
  }

  /**
   * Создает экземпляр из структуры параметров.
   */
  static from (options: TQueryOptions): QueryParams {
    return normalizeQueryOptions(options) ?? new QueryParams()
  }

  protected _append (key: string, value: string): void {
    const values = this._items.get(key)
    if (values) {
      values.push(value)
    }
    else {
      this._items.set(key, [value])
    }
  }

  protected _changed (): void {
    this._listener?.()
  }

  /**
   * Устанавливает слушателя изменений. Используется владельцем параметров для сброса кеша строки `URI`.
   *
   * @param listener Функция или `null` для отмены.
   */
  _changeListener (listener: null | (() => void)): void {
    this._listener = listener
  }

  /**
   * Количество уникальных ключей.
   */
  get size (): number {
    return this._items.size
  }

  isEmpty (): boolean {
    return this._items.size === 0
  }

  has (key: string): boolean {
    return this._items.has(key)
  }

  /**
   * Копия списка значений ключа или `undefined`.
   */
  get (key: string): undefined | readonly string[] {
    const values = this._items.get(key)
    return values ? [...values] : undefined
  }

  /**
   * Заменяет все значения ключа. Пустой массив удаляет ключ.
   */
  set (key: string, value: TQueryValue | readonly TQueryValue[]): this {
    const values = Array.isArray(value) ? value.map(valueToString) : [valueToString(value)]
    if (values.length === 0) {
      this._items.delete(key)
    }
    else {
      this._items.set(key, values)
    }
    this._changed()
    return this
  }

  /**
   * Добавляет значение к ключу, сохраняя прежние.
   */
  append (key: string, value: TQueryValue): this {
    this._append(key, valueToString(value))
    this._changed()
    return this
  }

  delete (key: string): boolean {
    const deleted = this._items.delete(key)
    if (deleted) {
      this._changed()
    }
    return deleted
  }

  clear (): void {
    if (this._items.size > 0) {
      this._items.clear()
      this._changed()
    }
  }

  keys (): IterableIterator<string> {
    return this._items.keys()
  }

  * entries (): IterableIterator<[string, readonly string[]]> {
    for (const [key, values] of this._items) {
      yield [key, [...values]]
    }
  }

  [Symbol.iterator] (): IterableIterator<string> {
    return this._items.keys()
  }

  clone (): QueryParams {
    const copy = new QueryParams()
    for (const [key, values] of this._items) {
      copy._items.set(key, [...values])
    }
    return copy
  }

  /**
   * Равенство наборов: одинаковые ключи в любом порядке и одинаковые последовательности значений каждого ключа.
   */
  equals (other: QueryParams): boolean {
    if (this._items.size !== other._items.size) {
      return false
    }
    for (const [key, values] of this._items) {
      const otherValues = other._items.get(key)
      if (!otherValues || otherValues.length !== values.length) {
        return false
      }
      for (let i = 0; i < values.length; ++i) {
        if (values[i] !== otherValues[i]) {
          return false
        }
      }
    }
    return true
  }

  urlSearchParams (): URLSearchParams {
    const params = new URLSearchParams()
    for (const [key, values] of this._items) {
      for (const value of values) {
        params.append(key, value)
      }
    }
    return params
  }

  /**
   * Строка в формате `application/x-www-form-urlencoded` без `?`.
   */
  toString (): string {
    return this.urlSearchParams().toString()
  }
}

export {
  type TQueryValue,
  type TQueryOptions,
  valueToString,
  decodeFormComponent,
  normalizeArrayQueryParams,
  normalizeObjectQueryParams,
  normalizeQueryOptions,
  QueryParams
}
