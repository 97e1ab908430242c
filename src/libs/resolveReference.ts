import { type TUriGroups, splitUri, joinUriGroups } from './splitUri.js'

/**
 * Удаляет сегменты `.` и `..` из пути.
 *
 * https://www.rfc-editor.org/rfc/rfc3986#section-5.2.4
 *
 * @param path Путь с возможными точечными сегментами.
 */
function removeDotSegments (path: string): string {
  const output: string[] = []
  let input = path
  while (input.length > 0) {
    if (input.startsWith('../')) {
      input = input.slice(3)
    }
    else if (input.startsWith('./')) {
      input = input.slice(2)
    }
    else if (input.startsWith('/./')) {
      input = input.slice(2)
    }
    else if (input === '/.') {
      input = '/'
    }
    else if (input.startsWith('/../')) {
      input = input.slice(3)
      output.pop()
    }
    else if (input === '/..') {
      input = '/'
      output.pop()
    }
    else if (input === '.' || input === '..') {
      input = ''
    }
    else {
      // Первый сегмент вместе с ведущим слешем, если он есть
      const next = input.indexOf('/', input.startsWith('/') ? 1 : 0)
      const end = next === -1 ? input.length : next
      output.push(input.slice(0, end))
      input = input.slice(end)
    }
  }
  return output.join('')
}

/**
 * Сливает относительный путь ссылки с путем базового `URI`.
 *
 * https://www.rfc-editor.org/rfc/rfc3986#section-5.2.3
 */
function mergePaths (base: TUriGroups, path: string): string {
  if (base.authority !== null && base.path === '') {
    return `/${path}`
  }
  const slash = base.path.lastIndexOf('/')
  return slash === -1 ? path : `${base.path.slice(0, slash + 1)}${path}`
}

/**
 * Разрешает ссылку относительно базового `URI` и возвращает результирующую строку.
 *
 * Отсутствующие в ссылке компоненты наследуются от базового `URI`. Реализует строгий вариант
 * https://www.rfc-editor.org/rfc/rfc3986#section-5.2.2 - ссылка со схемой никогда не считается относительной.
 *
 * @param base      Базовый `URI`.
 * @param reference Абсолютная или относительная ссылка.
 */
function resolveReference (base: string, reference: string): string {
  const b = splitUri(base)
  const r = splitUri(reference)
  if (r.scheme !== null) {
    return joinUriGroups({ ...r, path: removeDotSegments(r.path) })
  }
  if (r.authority !== null) {
    return joinUriGroups({ ...r, scheme: b.scheme, path: removeDotSegments(r.path) })
  }
  if (r.path === '') {
    return joinUriGroups({
      scheme: b.scheme,
      authority: b.authority,
      path: b.path,
      query: r.query ?? b.query,
      fragment: r.fragment
    })
  }
  const path = r.path.startsWith('/') ? r.path : mergePaths(b, r.path)
  return joinUriGroups({
    scheme: b.scheme,
    authority: b.authority,
    path: removeDotSegments(path),
    query: r.query,
    fragment: r.fragment
  })
}

export {
  removeDotSegments,
  mergePaths,
  resolveReference
}
