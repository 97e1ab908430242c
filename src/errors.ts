import {
  type IErrorDetail as IErrorDetail_,
  type IErrorLike as IErrorLike_,
  BaseError,
  createErrorLike
} from 'js-base-error'

const _errorNames = [
  'Uri.ConfigureError', 'Uri.UnknownComponentError', 'Uri.InvalidStateError', 'Uri.InvalidValueError'
] as const

type TErrorName = (typeof _errorNames)[number] // 'Uri.ConfigureError' | 'Uri.UnknownComponentError' | 'Uri.InvalidStateError' | 'Uri.InvalidValueError'

/**
 * Проверяет, является ли имя ошибки допустимым.
 *
 * @param name Предполагаемое имя ошибки.
 */
function isErrorName (name: unknown): name is TErrorName {
  return _errorNames.some((item) => item === name)
}

/**
 * Детали ошибки с кодом и описанием.
 */
interface IErrorDetail extends IErrorDetail_ {
  /**
   * Имя компонента `URI`, к которому относится ошибка, например `'port'` или `'query'`.
   */
  component?: string
}

/**
 * Базовый интерфейс деталей ошибок.
 */
interface IErrorLike extends IErrorLike_, IErrorDetail {
  component?: string
}

/**
 * Предопределенные описания ошибок.
 */
const errorDetails = Object.freeze({
  ConfigureError (message?: undefined | null | string, cause?: undefined | null | unknown): IErrorLike {
    return createErrorLike({
      name: 'Uri.ConfigureError',
      message,
      cause
    })
  },
  UnknownComponentError (component: string, message?: undefined | null | string, cause?: undefined | null | unknown): IErrorLike {
    return createErrorLike({
      name: 'Uri.UnknownComponentError',
      component,
      message,
      cause
    })
  },
  InvalidStateError (component: string, message?: undefined | null | string, cause?: undefined | null | unknown): IErrorLike {
    return createErrorLike({
      name: 'Uri.InvalidStateError',
      component,
      message,
      cause
    })
  },
  InvalidValueError (component: string, message?: undefined | null | string, cause?: undefined | null | unknown): IErrorLike {
    return createErrorLike({
      name: 'Uri.InvalidValueError',
      component,
      message,
      cause
    })
  }
} as const)

/**
 * Базовый класс ошибок.
 */
abstract class UriError extends BaseError<IErrorLike> { }

/**
 * Ошибки связанные с конфигурированием, например регистрация схемы в замороженном реестре.
 */
class ConfigureError extends UriError { }

/**
 * Имя компонента, переданное конструктору или {@link Uri.resolve()}, не является известным компонентом `URI`.
 */
class UnknownComponentError extends UriError { }

/**
 * Операция недопустима в текущем состоянии компонента.
 *
 * Например, обращение к параметрам строки запроса, когда она хранится непрозрачной строкой.
 */
class InvalidStateError extends UriError { }

/**
 * Значение не может быть приведено к типу компонента: порт вне `[0, 65535]`, нечисловой порт и т.п.
 *
 * Ошибка выбрасывается до изменения компонента - прежнее значение и кеш остаются нетронутыми.
 */
class InvalidValueError extends UriError { }

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
}
