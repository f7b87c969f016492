/**
 * Column selection with wildcards
 *
 * A selector is one of:
 * - a plain column name: `price`
 * - an optional column, skipped when absent: `price?`
 * - a wildcard: `price_*`
 * - a full-match regular expression: `regex:price_(usd|eur)`
 */

import { DatasetError } from '../errors'

const REGEX_PREFIX = 'regex:'

function isRegexSelector(selector: string): boolean {
  return selector.toLowerCase().startsWith(REGEX_PREFIX)
}

/** Unescaped `*` */
function hasWildcard(selector: string): boolean {
  return /(^|[^\\])\*/.test(selector)
}

function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/**
 * Convert a wildcard selector into an anchored pattern with one capture group
 * per `*`
 */
function wildcardToPattern(selector: string): string {
  return selector
    .split(/(?<!\\)\*/)
    .map(part => escapeRegex(part.replace(/\\\*/g, '*')))
    .join('(.*)')
}

function toRegExp(selector: string): RegExp {
  const source = isRegexSelector(selector)
    ? selector.slice(REGEX_PREFIX.length).trim()
    : wildcardToPattern(selector)
  try {
    return new RegExp(`^(?:${source})$`)
  } catch {
    throw new DatasetError(`Invalid column pattern: ${selector}`, { selector })
  }
}

export function isPatternSelector(selector: string): boolean {
  return isRegexSelector(selector) || hasWildcard(selector)
}

/**
 * Expand selectors against the available columns, preserving selector order
 * and removing duplicates.
 *
 * @throws DatasetError when a required plain column is missing
 */
export function expandColumns(available: readonly string[], selectors: string | readonly string[]): string[] {
  const list = typeof selectors === 'string' ? [selectors] : selectors
  const result = new Set<string>()

  for (const selector of list) {
    if (isPatternSelector(selector)) {
      const pattern = toRegExp(selector)
      for (const column of available) {
        if (pattern.test(column)) result.add(column)
      }
      continue
    }

    if (selector.endsWith('?') && !available.includes(selector)) {
      const name = selector.slice(0, -1)
      if (available.includes(name)) result.add(name)
      continue
    }

    if (!available.includes(selector)) {
      throw new DatasetError(`Column ${selector} does not exist`, { column: selector })
    }
    result.add(selector)
  }

  return [...result]
}

/**
 * Expand a rename mapping. A wildcard key renames every match, substituting
 * each `*` in the value with the text the matching `*` captured.
 */
export function expandColumnMapping(
  available: readonly string[],
  mapping: Readonly<Record<string, string>>
): Record<string, string> {
  const result: Record<string, string> = {}

  for (const [selector, target] of Object.entries(mapping)) {
    if (!isPatternSelector(selector)) {
      const optional = selector.endsWith('?') && !available.includes(selector)
      const name = optional ? selector.slice(0, -1) : selector
      if (available.includes(name)) {
        result[name] = target
      } else if (!optional) {
        throw new DatasetError(`Column ${name} does not exist`, { column: name })
      }
      continue
    }

    const pattern = toRegExp(selector)
    for (const column of available) {
      const match = pattern.exec(column)
      if (!match) continue
      if (selector === target) {
        result[column] = column
      } else if (isRegexSelector(selector)) {
        result[column] = column.replace(pattern, target)
      } else {
        let group = 0
        result[column] = target.replace(/(?<!\\)\*/g, () => match[++group] ?? '')
      }
    }
  }

  return result
}
