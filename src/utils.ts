import type { TNonemptyString } from './types.js'

/**
 * Значение `undefined | null`.
 */
function isNullish (value: unknown): value is (undefined | null) {
  return typeof value === 'undefined' || value === null
}

/**
 * Является ли аргумент `value` строкой.
 */
function isString (value: unknown): value is string {
  return typeof value === 'string'
}

/**
 * Является ли аргумент `value` непустой строкой.
 */
function isNonemptyString (value: unknown): value is TNonemptyString {
  return typeof value === 'string' && value.length > 0
}

/**
 * Является ли значение `value` структуроподобным объектом `{...}` исключая массивы `[]`.
 */
function isPlainObject<T> (value: T): value is (object & T) {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/**
 * Пытается привести `value` к Json-строке или возвращает пустую строку.
 */
function safeToJson (value: unknown): string {
  try {
    return JSON.stringify(value) ?? ''
  } catch (_) {
    return ''
  }
}

export {
  isNullish,
  isString,
  isNonemptyString,
  isPlainObject,
  safeToJson
}
