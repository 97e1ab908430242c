/**
 * Группы верхнего уровня строки `URI`.
 *
 * Отсутствующая группа равна `null`, присутствующая, но пустая - `''`. Путь присутствует всегда.
 */
type TUriGroups = {
  scheme: null | string
  authority: null | string
  path: string
  query: null | string
  fragment: null | string
}

/**
 * Группы компонента `authority` вида `user:password@host:port`.
 */
type TAuthorityGroups = {
  user: null | string
  password: null | string
  host: string
  port: null | string
}

// https://www.rfc-editor.org/rfc/rfc3986#appendix-B
// Схема дополнительно ограничена допустимыми символами, иначе '127.0.0.1:8080/path' получит схему '127.0.0.1'.
const _uri = /^(?:([a-z][a-z0-9+.-]*):)?(?:\/\/([^/?#]*))?([^?#]*)(?:\?([^#]*))?(?:#([\s\S]*))?$/i
// Порт учитывается только в виде ':digits' после хоста или IPv6 литерала в скобках.
const _hostPort = /^(\[[^\]]*\]|[^:]*):(\d*)$/
const _maxPort = 65535

const emptyGroups: Readonly<TUriGroups> = Object.freeze({
  scheme: null,
  authority: null,
  path: '',
  query: null,
  fragment: null
})

/**
 * Разбивает строку на группы `scheme`, `authority`, `path`, `query` и `fragment`.
 *
 * Разбор не проверяет грамматику: любая строка разбивается на какие-то группы.
 *
 * @param uri Произвольная строка.
 */
function splitUri (uri: string): TUriGroups {
  const m = _uri.exec(uri)
  if (!m) {
    // Недостижимо - выражение совпадает с любой строкой.
    return { ...emptyGroups, path: uri }
  }
  return {
    scheme: m[1] ?? null,
    authority: m[2] ?? null,
    path: m[3] ?? '',
    query: m[4] ?? null,
    fragment: m[5] ?? null
  }
}

/**
 * Разбивает `authority` на учетные данные, хост и порт.
 *
 * Порт выделяется только из завершающих `:digits` в диапазоне `[0, 65535]`, иначе текст остается частью хоста.
 *
 * @param authority Строка вида `user:password@host:port`, где все кроме хоста необязательно.
 */
function splitAuthority (authority: string): TAuthorityGroups {
  const at = authority.lastIndexOf('@')
  const userInfo = at === -1 ? null : authority.slice(0, at)
  const hostPort = at === -1 ? authority : authority.slice(at + 1)
  let user: null | string = null
  let password: null | string = null
  if (userInfo !== null) {
    const colon = userInfo.indexOf(':')
    if (colon === -1) {
      user = userInfo
    }
    else {
      user = userInfo.slice(0, colon)
      password = userInfo.slice(colon + 1)
    }
  }
  const m = _hostPort.exec(hostPort)
  const port = m?.[2] ?? ''
  if (!m || Number.parseInt(port, 10) > _maxPort) {
    return { user, password, host: hostPort, port: null }
  }
  return { user, password, host: m[1] ?? '', port: port ? port : null }
}

/**
 * Собирает строку из групп по правилам https://www.rfc-editor.org/rfc/rfc3986#section-5.3
 *
 * @param groups Группы верхнего уровня.
 */
function joinUriGroups (groups: TUriGroups): string {
  let result = ''
  if (groups.scheme !== null) {
    result += `${groups.scheme}:`
  }
  if (groups.authority !== null) {
    result += `//${groups.authority}`
  }
  result += groups.path
  if (groups.query !== null) {
    result += `?${groups.query}`
  }
  if (groups.fragment !== null) {
    result += `#${groups.fragment}`
  }
  return result
}

export {
  type TUriGroups,
  type TAuthorityGroups,
  emptyGroups,
  splitUri,
  splitAuthority,
  joinUriGroups
}
