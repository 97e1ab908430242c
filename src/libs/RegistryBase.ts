import { safeToJson } from '../utils.js'
import { ConfigureError, errorDetails } from '../errors.js'

/**
 * Основа реестров с возможностью заморозки.
 *
 * Повторный ключ не заменяет зарегистрированный элемент: регистрация пропускается с предупреждением
 * `[Uri.<name>]`. Регистрация в замороженном реестре вызывает {@link ConfigureError}.
 */
abstract class RegistryBase<TKey, TValue> {
  protected readonly _name: string
  protected readonly _items = new Map<TKey, TValue>()
  protected _frozen = false

  /**
   * @param name Имя реестра для сообщений.
   */
  constructor(name: string) {
    this._name = name
  }

  get keys (): IterableIterator<TKey> {
    return this._items.keys()
  }

  get frozen (): boolean {
    return this._frozen
  }

  /**
   * Запретить добавление новых элементов.
   */
  freeze (): void {
    this._frozen = true
  }

  has (key: TKey): boolean {
    return this._items.has(key)
  }

  /**
   * Добавляет элемент и возвращает `false`, если ключ уже занят.
   */
  protected _add (key: TKey, value: TValue): boolean {
    if (this._frozen) {
      throw new ConfigureError(errorDetails.ConfigureError(`${this._name} заморожен и не может зарегистрировать ключ ${safeToJson(key)}.`))
    }
    if (this._items.has(key)) {
      console.warn(`[Uri.${this._name}] Ключ ${safeToJson(key)} уже зарегистрирован.`)
      return false
    }
    this._items.set(key, value)
    return true
  }
}

export {
  RegistryBase
}
