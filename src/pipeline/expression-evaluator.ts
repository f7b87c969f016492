/**
 * Condition Expression Evaluator
 *
 * Used by `if` on any step, and by row conditions in `filter` / `where`.
 *
 * Supports:
 * - JSONPath value extraction: $.row.status, $.row["unit price"], $.dataset.rowCount
 * - Comparisons: ==, !=, >, <, >=, <=
 * - Logical operators: && (binds tighter), ||
 * - A lone operand tests truthiness: $.row.active
 * - Literals: strings ("value" or 'value'), numbers (123), booleans, null
 */

import jp from 'jsonpath'
import { ExpressionError } from '../errors'

const TOKEN = /\s*(&&|\|\||==|!=|>=|<=|>|<|"(?:[^"\\]|\\.)*"|'(?:[^'\\]|\\.)*'|\$(?:\.[\w$-]+|\[(?:"[^"]*"|'[^']*'|\d+)\])*|[^\s&|=!<>]+)/y

const COMPARATORS = new Set(['==', '!=', '>', '<', '>=', '<='])

export class ExpressionEvaluator {
  /**
   * Evaluate a condition expression against a context
   *
   * @throws ExpressionError when the expression cannot be parsed
   */
  static evaluate(expression: string, context: Record<string, unknown>): boolean {
    const tokens = this.tokenize(expression)
    if (tokens.length === 0) {
      throw new ExpressionError('Empty condition expression', expression)
    }

    return this.split(tokens, '||').some(conjunction =>
      this.split(conjunction, '&&').every(clause => this.evaluateClause(clause, context, expression))
    )
  }

  private static tokenize(expr: string): string[] {
    const tokens: string[] = []
    TOKEN.lastIndex = 0
    while (TOKEN.lastIndex < expr.length) {
      if (expr.slice(TOKEN.lastIndex).trim() === '') break
      const match = TOKEN.exec(expr)
      if (!match) {
        throw new ExpressionError(`Unexpected input at position ${TOKEN.lastIndex}`, expr)
      }
      tokens.push(match[1])
    }
    return tokens
  }

  private static split(tokens: string[], operator: string): string[][] {
    const groups: string[][] = [[]]
    for (const token of tokens) {
      if (token === operator) groups.push([])
      else groups[groups.length - 1].push(token)
    }
    return groups
  }

  private static evaluateClause(clause: string[], context: Record<string, unknown>, expression: string): boolean {
    if (clause.length === 1) {
      return Boolean(this.getValue(clause[0], context, expression))
    }
    if (clause.length === 3 && COMPARATORS.has(clause[1])) {
      const [left, op, right] = clause
      return this.compare(this.getValue(left, context, expression), op, this.getValue(right, context, expression))
    }
    throw new ExpressionError(`Malformed condition: ${clause.join(' ') || '(empty)'}`, expression)
  }

  /**
   * Get value from token (JSONPath, literal, or boolean)
   */
  private static getValue(token: string, context: Record<string, unknown>, expression: string): unknown {
    if (token.startsWith('$')) {
      try {
        return jp.value(context, token)
      } catch (error) {
        throw new ExpressionError(
          `Invalid path ${token}: ${error instanceof Error ? error.message : String(error)}`,
          expression
        )
      }
    }

    if ((token.startsWith('"') && token.endsWith('"')) || (token.startsWith("'") && token.endsWith("'"))) {
      return token.slice(1, -1).replace(/\\(.)/g, '$1')
    }

    if (token === 'true') return true
    if (token === 'false') return false
    if (token === 'null') return null

    if (!isNaN(Number(token))) {
      return Number(token)
    }

    // Bare words compare as strings
    return token
  }

  private static compare(left: unknown, op: string, right: unknown): boolean {
    switch (op) {
      case '==':
        return looseEquals(left, right)
      case '!=':
        return !looseEquals(left, right)
      case '>':
        return ordered(left, right, (a, b) => a > b)
      case '<':
        return ordered(left, right, (a, b) => a < b)
      case '>=':
        return ordered(left, right, (a, b) => a >= b)
      case '<=':
        return ordered(left, right, (a, b) => a <= b)
      default:
        return false
    }
  }
}

/**
 * Numbers and numeric strings compare as numbers, so CSV text like "42"
 * equals 42; null and undefined equal each other.
 */
function looseEquals(left: unknown, right: unknown): boolean {
  if (left === right) return true
  if (left === null || left === undefined || right === null || right === undefined) {
    return (left === null || left === undefined) && (right === null || right === undefined)
  }
  const a = toNumber(left)
  const b = toNumber(right)
  if (a !== undefined && b !== undefined) return a === b
  return String(left) === String(right)
}

function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number') return value
  if (typeof value === 'string' && value.trim() !== '' && !isNaN(Number(value))) return Number(value)
  return undefined
}

function ordered(left: unknown, right: unknown, cmp: (a: number | string, b: number | string) => boolean): boolean {
  if (left === null || left === undefined || right === null || right === undefined) return false
  const a = toNumber(left)
  const b = toNumber(right)
  if (a !== undefined && b !== undefined) return cmp(a, b)
  return cmp(String(left), String(right))
}
