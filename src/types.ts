type Nullish = undefined | null

/**
 * Непустая строка.
 */
type TNonemptyString = string & { __TNonemptyString: never }

/**
 * `integer` в диапазоне `[0, 65535]`.
 */
type TPortNumber = number & { __TPortNumber: never }

/**
 * `integer` в диапазоне `[0, 65535]`.
 */
function isPortNumber (value: unknown): value is TPortNumber {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0 && value <= 65535
}

export {
  type Nullish,
  type TNonemptyString,
  type TPortNumber,
  isPortNumber
}
