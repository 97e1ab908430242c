import { isNullish, isString } from '../utils.js'
import { errorDetails, InvalidValueError } from '../errors.js'
import type { TUriComponents, TUriComponentName, UriState } from './UriState.js'

/**
 * Именованный аксессор компонента `URI`.
 *
 * Экземпляры не хранят состояния и разделяются всеми `URI` - все данные находятся в {@link UriState}.
 *
 * @template TValue Тип значения возвращаемого {@link get()}.
 * @template TName  Имя компонента.
 */
abstract class Part<TValue, TName extends string = string> {
  readonly name: TName

  constructor(name: TName) {
    this.name = name
  }

  /**
   * Возвращает значение, при необходимости разбирая его из исходной строки.
   */
  abstract get (state: UriState): TValue
  /**
   * Проверяет, нормализует и сохраняет значение, затем сбрасывает кеш канонической строки.
   *
   * `undefined | null` эквивалентны {@link delete()}. Недопустимое значение вызывает {@link InvalidValueError}
   * до изменения компонента.
   */
  abstract set (state: UriState, value: unknown): void
  /**
   * Устанавливает значение по умолчанию и сбрасывает кеш канонической строки.
   */
  abstract delete (state: UriState): void
  /**
   * Строковое представление компонента вместе с его разделителем (`'http:'`, `':8080'`, `'?a=1'`) или пустая строка.
   */
  abstract render (state: UriState): string

  protected _invalid (message: string): InvalidValueError {
    return new InvalidValueError(errorDetails.InvalidValueError(this.name, message))
  }
}

/**
 * Скалярный компонент, значение которого хранится в собственном слоте {@link UriState}.
 */
abstract class ScalarPart<K extends TUriComponentName> extends Part<TUriComponents[K], K> {
  /**
   * Разбирает значение из исходной строки.
   */
  protected abstract _load (state: UriState): TUriComponents[K]
  /**
   * Проверяет и приводит пользовательское значение к типу компонента.
   */
  protected abstract _normalize (value: unknown): TUriComponents[K]
  /**
   * Значение по умолчанию.
   */
  protected abstract _empty (): TUriComponents[K]

  protected _store (state: UriState, value: TUriComponents[K]): void {
    state.write(this.name, value)
  }

  get (state: UriState): TUriComponents[K] {
    const value = state.read(this.name)
    if (value !== undefined) {
      return value
    }
    const loaded = this._load(state)
    this._store(state, loaded)
    return loaded
  }

  set (state: UriState, value: unknown): void {
    const normalized = isNullish(value) ? this._empty() : this._normalize(value)
    this._store(state, normalized)
    state.invalidate()
  }

  delete (state: UriState): void {
    this._store(state, this._empty())
    state.invalidate()
  }
}

/**
 * Пара аксессор/значение, полученная разбором составной строки.
 */
type TPartAssignment = readonly [Part<unknown>, unknown]

/**
 * Составной компонент: строка собирается из фиксированного упорядоченного списка частей, а присваивание
 * разбирает строку обратно и присваивает каждую часть по очереди.
 */
abstract class CompoundPart<TName extends string = string> extends Part<string, TName> {
  protected readonly _parts: readonly Part<unknown>[]

  constructor(name: TName, parts: readonly Part<unknown>[]) {
    super(name)
    this._parts = Object.freeze([...parts])
  }

  /**
   * Разбирает строку на значения частей.
   *
   * Части, присваивание которых может завершиться ошибкой, должны идти первыми: так ошибка не оставит составной
   * компонент частично измененным.
   */
  protected abstract _split (value: string): readonly TPartAssignment[]

  get (state: UriState): string {
    return this.render(state)
  }

  render (state: UriState): string {
    let result = ''
    for (const part of this._parts) {
      result += part.render(state)
    }
    return result
  }

  set (state: UriState, value: unknown): void {
    if (isNullish(value)) {
      this.delete(state)
      return
    }
    if (!isString(value)) {
      throw this._invalid(`Ожидается строка, получено typeof '${typeof value}'.`)
    }
    for (const [part, item] of this._split(value)) {
      part.set(state, item)
    }
  }

  delete (state: UriState): void {
    for (const part of this._parts) {
      part.delete(state)
    }
  }
}

export {
  Part,
  ScalarPart,
  type TPartAssignment,
  CompoundPart
}
