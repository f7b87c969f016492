import { RegistryConflictError } from '../errors'
import type { RecipeSection } from '../errors'
import type { RegisterOptions, StepKindDefinition } from './types'

/**
 * Read-only view the validator and executor depend on
 */
export interface StepRegistryView {
  resolve(section: RecipeSection, kind: string): StepKindDefinition | undefined
  has(section: RecipeSection, kind: string): boolean
  list(section?: RecipeSection): StepKindDefinition[]
}

function makeKey(section: RecipeSection, kind: string): string {
  return `${section}:${kind}`
}

const SECTION_ORDER: readonly RecipeSection[] = ['read', 'wrangles', 'write']

// Code point order, so generated artifacts do not depend on the locale
function byKind(a: StepKindDefinition, b: StepKindDefinition): number {
  if (a.section !== b.section) return SECTION_ORDER.indexOf(a.section) - SECTION_ORDER.indexOf(b.section)
  return a.kind < b.kind ? -1 : a.kind > b.kind ? 1 : 0
}

/**
 * Step Registry - maps (section, kind) to a step definition
 *
 * Kind names are unique per section: `file` may be both a read and a write
 * kind. Registering an existing kind without `override` is a conflict, and
 * once frozen the registry accepts no registrations at all.
 */
export class StepRegistry implements StepRegistryView {
  private definitions = new Map<string, StepKindDefinition>()
  private frozen = false

  register(definition: StepKindDefinition, options: RegisterOptions = {}): void {
    if (this.frozen) {
      throw new RegistryConflictError(
        `Cannot register ${definition.section} kind ${definition.kind}: registry is read-only`,
        { section: definition.section, kind: definition.kind }
      )
    }
    const key = makeKey(definition.section, definition.kind)
    if (this.definitions.has(key) && !options.override) {
      throw new RegistryConflictError(
        `${definition.section} kind ${definition.kind} is already registered`,
        { section: definition.section, kind: definition.kind }
      )
    }
    this.definitions.set(key, definition)
  }

  resolve(section: RecipeSection, kind: string): StepKindDefinition | undefined {
    return this.definitions.get(makeKey(section, kind))
  }

  has(section: RecipeSection, kind: string): boolean {
    return this.definitions.has(makeKey(section, kind))
  }

  /**
   * Definitions sorted by section then kind
   */
  list(section?: RecipeSection): StepKindDefinition[] {
    return Array.from(this.definitions.values())
      .filter(def => !section || def.section === section)
      .sort(byKind)
  }

  /**
   * Make the registry read-only
   */
  freeze(): this {
    this.frozen = true
    return this
  }

  get isFrozen(): boolean {
    return this.frozen
  }

  /**
   * Overlay for one run. Registrations stay in the overlay and vanish with it.
   */
  scope(): ScopedStepRegistry {
    return new ScopedStepRegistry(this)
  }
}

/**
 * Run-scoped overlay over a (usually frozen) registry
 */
export class ScopedStepRegistry implements StepRegistryView {
  private local = new Map<string, StepKindDefinition>()

  constructor(private parent: StepRegistryView) {}

  /**
   * Register a run-scoped kind. Shadowing a parent kind needs `override`.
   */
  register(definition: StepKindDefinition, options: RegisterOptions = {}): void {
    const key = makeKey(definition.section, definition.kind)
    const exists = this.local.has(key) || this.parent.has(definition.section, definition.kind)
    if (exists && !options.override) {
      throw new RegistryConflictError(
        `${definition.section} kind ${definition.kind} is already registered; pass override to replace it for this run`,
        { section: definition.section, kind: definition.kind }
      )
    }
    this.local.set(key, definition)
  }

  resolve(section: RecipeSection, kind: string): StepKindDefinition | undefined {
    return this.local.get(makeKey(section, kind)) ?? this.parent.resolve(section, kind)
  }

  has(section: RecipeSection, kind: string): boolean {
    return this.local.has(makeKey(section, kind)) || this.parent.has(section, kind)
  }

  list(section?: RecipeSection): StepKindDefinition[] {
    const merged = new Map<string, StepKindDefinition>()
    for (const def of this.parent.list(section)) merged.set(makeKey(def.section, def.kind), def)
    for (const def of this.local.values()) {
      if (!section || def.section === section) merged.set(makeKey(def.section, def.kind), def)
    }
    return Array.from(merged.values()).sort(byKind)
  }
}
