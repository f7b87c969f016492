import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { writeFileSync } from 'fs'
import { resolveTemplates } from '../../recipe/template'
import { loadRecipe, loadRecipeFile, loadRecipeText } from '../../recipe/loader'
import { TemplateResolutionError } from '../../errors'
import { createTempDir, type TempDir } from '../utils/test-helpers'

describe('resolveTemplates', () => {
  it('keeps the type of a value that is a lone placeholder', () => {
    expect(resolveTemplates({ rows: '{{ count }}', flag: '${ENABLED}' }, { variables: { count: 5 }, env: { ENABLED: 'yes' } })).toEqual({
      rows: 5,
      flag: 'yes',
    })
  })

  it('interpolates placeholders inside longer strings', () => {
    const resolved = resolveTemplates(
      { name: 'data/${REGION}/{{ file }}.csv', note: 'limit {{ limit }}' },
      { variables: { file: 'orders', limit: { max: 3 } }, env: { REGION: 'eu' } }
    )

    expect(resolved).toEqual({ name: 'data/eu/orders.csv', note: 'limit {"max":3}' })
  })

  it('prefers variables over the environment', () => {
    expect(resolveTemplates('${TABLE}', { variables: { TABLE: 'from-vars' }, env: { TABLE: 'from-env' } })).toBe('from-vars')
  })

  it('fails on an undefined variable', () => {
    expect(() => resolveTemplates({ a: '{{ missing }}' }, { env: {} })).toThrow(TemplateResolutionError)
    expect(() => resolveTemplates({ a: '{{ missing }}' }, { env: {} })).toThrow('Variable missing is not defined')
  })

  it('leaves non-string scalars alone', () => {
    expect(resolveTemplates([1, true, null], { env: {} })).toEqual([1, true, null])
  })
})

describe('includes', () => {
  let dir: TempDir

  beforeEach(() => {
    dir = createTempDir()
  })

  afterEach(() => {
    dir.cleanup()
  })

  it('splices an included list into the enclosing list', () => {
    writeFileSync(dir.file('steps.yaml'), '- uppercase:\n    column: name\n- trim:\n    column: "{{ col }}"\n')

    const resolved = resolveTemplates(
      { wrangles: [{ include: 'steps.yaml' }, { lowercase: { column: 'x' } }] },
      { baseDir: dir.path, variables: { col: 'city' }, env: {} }
    )

    expect(resolved).toEqual({
      wrangles: [{ uppercase: { column: 'name' } }, { trim: { column: 'city' } }, { lowercase: { column: 'x' } }],
    })
  })

  it('replaces a mapping that is only an include', () => {
    writeFileSync(dir.file('source.yaml'), 'name: input.csv\n')

    expect(resolveTemplates({ file: { include: 'source.yaml' } }, { baseDir: dir.path, env: {} })).toEqual({
      file: { name: 'input.csv' },
    })
  })

  it('reports a missing include', () => {
    expect(() => resolveTemplates({ include: 'nope.yaml' }, { baseDir: dir.path, env: {} })).toThrow(/Included file not found/)
  })

  it('detects include cycles', () => {
    writeFileSync(dir.file('a.yaml'), 'include: b.yaml\n')
    writeFileSync(dir.file('b.yaml'), 'include: a.yaml\n')

    expect(() => loadRecipeFile(dir.file('a.yaml'), { env: {} })).toThrow(/Include cycle detected/)
  })
})

describe('loadRecipe', () => {
  let dir: TempDir

  beforeEach(() => {
    dir = createTempDir()
  })

  afterEach(() => {
    dir.cleanup()
  })

  it('parses recipe text into a frozen document', () => {
    const document = loadRecipeText('read:\n  - file:\n      name: in.csv\n', { env: {} })

    expect(document).toEqual({ read: [{ file: { name: 'in.csv' } }] })
    expect(Object.isFrozen(document)).toBe(true)
  })

  it('treats an empty recipe as an empty document', () => {
    expect(loadRecipeText('', { env: {} })).toEqual({})
  })

  it('rejects a recipe that is not a mapping', () => {
    expect(() => loadRecipeText('- a\n- b\n', { env: {} })).toThrow(TemplateResolutionError)
  })

  it('reports YAML syntax errors as template errors', () => {
    expect(() => loadRecipeText('read: [unclosed', { env: {} })).toThrow(/could not be parsed/)
  })

  it('loads a file by path, by string and by object', () => {
    const path = dir.file('recipe.yaml')
    writeFileSync(path, 'write:\n  - memory: "{{ table }}"\n')
    const options = { variables: { table: 'out' }, env: {} }
    const expected = { write: [{ memory: 'out' }] }

    expect(loadRecipe({ path }, options)).toEqual(expected)
    expect(loadRecipe(path, options)).toEqual(expected)
    expect(loadRecipe({ write: [{ memory: '{{ table }}' }] }, options)).toEqual(expected)
  })
})
