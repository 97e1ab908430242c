import { type interfaceImplements, interfaceDefineHasInstanceMarker } from 'ts-interface-core'
import type { UriMaterializerLike } from './UriMaterializerLike.js'

/**
 * Значение ссылки {@link LinkableLike.link()}: строка или объект, который может быть приведен к строке `URI`.
 */
type TLinkValue = string | URL | LinkableLike | UriMaterializerLike

/**
 * Объект, ссылающийся на `URI`. Такой объект можно передать конструктору `Uri` вместо строки.
 *
 * **Note:** Этот класс можно реализовать используя {@link interfaceImplements()}.
 */
abstract class LinkableLike {
  /**
   * Возвращает ссылку. Если результат не строка, он разрешается повторно.
   */
  abstract link (): TLinkValue
}
interfaceDefineHasInstanceMarker(LinkableLike)

export {
  type TLinkValue,
  LinkableLike
}
