import { type interfaceImplements, interfaceDefineHasInstanceMarker } from 'ts-interface-core'

/**
 * Объект, способный построить строку `URI`, например описание ресурса или файла.
 *
 * **Note:** Этот класс можно реализовать используя {@link interfaceImplements()}.
 */
abstract class UriMaterializerLike {
  abstract makeUri (): string
}
interfaceDefineHasInstanceMarker(UriMaterializerLike)

export {
  UriMaterializerLike
}
