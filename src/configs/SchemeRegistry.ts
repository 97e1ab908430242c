import { isNonemptyString, safeToJson } from '../utils.js'
import { ConfigureError, errorDetails } from '../errors.js'
import { RegistryBase } from '../libs/RegistryBase.js'

const _schemeName = /^[a-z][a-z0-9+.-]*$/

/**
 * Описание схемы `URI`.
 */
class Scheme {
  protected readonly _name: string
  protected readonly _slashed: boolean

  /**
   * @param name    Имя схемы. Приводится к нижнему регистру.
   * @param slashed Иерархическая схема: строка `URI` содержит `//` даже при пустом `authority`, например
   *                `file:///etc/hosts`.
   */
  constructor(name: string, slashed: boolean) {
    this._name = name.toLowerCase()
    this._slashed = slashed
  }

  get name (): string {
    return this._name
  }

  get slashed (): boolean {
    return this._slashed
  }

  toString (): string {
    return this._name
  }
}

/**
 * Реестр известных схем.
 *
 * Незарегистрированные схемы не считаются иерархическими, для них `//` выводится только при непустом `authority`.
 */
class SchemeRegistry extends RegistryBase<string, Scheme> {
  /**
   * @param schemes Начальные схемы.
   */
  constructor(schemes?: undefined | null | Iterable<Scheme>) {
    super('SchemeRegistry')
    if (schemes) {
      for (const scheme of schemes) {
        this.register(scheme)
      }
    }
  }

  /**
   * Регистрирует схему. Повторная регистрация имени игнорируется с предупреждением и возвращает `false`.
   *
   * @param scheme Экземпляр {@link Scheme}.
   */
  register (scheme: Scheme): boolean {
    if (!isNonemptyString(scheme.name) || !_schemeName.test(scheme.name)) {
      throw new ConfigureError(errorDetails.ConfigureError(`Именем схемы должна быть строка вида 'alpha *( alpha / digit / "+" / "-" / "." )', получено: ${safeToJson(scheme.name)}.`))
    }
    return this._add(scheme.name, scheme)
  }

  /**
   * Возвращает зарегистрированную схему или новое неиерархическое описание.
   *
   * @param name Имя схемы в любом регистре.
   */
  get (name: string): Scheme {
    const key = name.toLowerCase()
    return this._items.get(key) ?? new Scheme(key, false)
  }
}

/**
 * Иерархические схемы реестра по умолчанию.
 */
const defaultSlashedSchemes = Object.freeze([
  'http', 'https', 'ws', 'wss', 'ftp', 'ftps', 'sftp', 'ssh', 'git', 'file', 'telnet',
  'ldap', 'ldaps', 'irc', 'rtsp', 'redis', 'amqp', 'mqtt', 'postgresql'
] as const)

/**
 * Реестр по умолчанию для {@link Uri.schemes}.
 */
const defaultSchemeRegistry = new SchemeRegistry(defaultSlashedSchemes.map((name) => new Scheme(name, true)))

export {
  Scheme,
  SchemeRegistry,
  defaultSlashedSchemes,
  defaultSchemeRegistry
}
