import { describe, it, expect } from 'vitest'
import { ExpressionEvaluator } from '../../pipeline/expression-evaluator'
import { ExpressionError } from '../../errors'

const context = {
  row: { qty: '3', status: 'active', name: 'ada', flag: false, 'unit price': 7.5 },
  dataset: { rowCount: 4, columns: ['qty', 'status'] },
  variables: { env: 'prod' },
}

function evaluate(expression: string): boolean {
  return ExpressionEvaluator.evaluate(expression, context)
}

describe('ExpressionEvaluator', () => {
  it('compares numeric text as numbers', () => {
    expect(evaluate('$.row.qty > 2')).toBe(true)
    expect(evaluate('$.row.qty == 3')).toBe(true)
    expect(evaluate('$.row.qty != 3')).toBe(false)
  })

  it('compares quoted and bare strings', () => {
    expect(evaluate('$.row.status == "active"')).toBe(true)
    expect(evaluate("$.row.status == 'inactive'")).toBe(false)
    expect(evaluate('$.row.status == active')).toBe(true)
    expect(evaluate('$.row.name < "b"')).toBe(true)
  })

  it('reads bracketed keys, dataset facts and variables', () => {
    expect(evaluate("$.row['unit price'] < 10")).toBe(true)
    expect(evaluate('$.dataset.rowCount >= 4')).toBe(true)
    expect(evaluate('$.variables.env == "prod"')).toBe(true)
  })

  it('binds && tighter than ||', () => {
    expect(evaluate('false || true && false')).toBe(false)
    expect(evaluate('true || true && false')).toBe(true)
  })

  it('tests a lone operand for truthiness', () => {
    expect(evaluate('$.row.flag')).toBe(false)
    expect(evaluate('$.row.status')).toBe(true)
  })

  it('treats missing values as null', () => {
    expect(evaluate('$.row.missing == null')).toBe(true)
    expect(evaluate('$.row.missing > 1')).toBe(false)
  })

  it('rejects malformed and empty conditions', () => {
    expect(() => evaluate('$.row.qty ==')).toThrow(ExpressionError)
    expect(() => evaluate('$.row.qty == 1 2')).toThrow('Malformed condition: $.row.qty == 1 2')
    expect(() => evaluate('   ')).toThrow('Empty condition expression')
  })
})
