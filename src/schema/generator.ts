/**
 * Recipe JSON Schema generator
 *
 * Renders the registry's step kinds as one JSON Schema document for recipe
 * authoring tools. Output depends only on the registry contents: kinds are
 * sorted and keys are emitted in a fixed order.
 */

import { RECIPE_SECTIONS, type RecipeSection } from '../recipe/types'
import type { StepRegistryView } from '../registry/step-registry'
import type { PropertySchema, StepKindDefinition } from '../registry/types'
import { effectiveSchema } from './validator'

type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue }

function sortKeys(value: unknown): JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value
  }
  if (Array.isArray(value)) return value.map(sortKeys)
  if (typeof value === 'object') {
    const sorted: { [key: string]: JsonValue } = {}
    for (const key of Object.keys(value).sort()) {
      const child: unknown = Reflect.get(value, key)
      if (child !== undefined) sorted[key] = sortKeys(child)
    }
    return sorted
  }
  return null
}

function stepSchema(definition: StepKindDefinition): PropertySchema {
  const schema = effectiveSchema(definition)
  return {
    type: 'object',
    ...(definition.description && { description: definition.description }),
    properties: schema.properties,
    ...(schema.required && { required: schema.required }),
    ...(schema.anyOf && { anyOf: schema.anyOf }),
    additionalProperties: schema.additionalProperties ?? false,
  }
}

function sectionSchema(registry: StepRegistryView, section: RecipeSection): Record<string, unknown> {
  const variants = registry.list(section).map(definition => {
    const config = stepSchema(definition)
    // Nested lists point back at their section's definition
    const withChildren: Record<string, unknown> = definition.children
      ? {
          ...config,
          properties: {
            ...config.properties,
            [definition.children]: { $ref: `#/definitions/${definition.childSection ?? 'wrangles'}` },
          },
        }
      : config
    return {
      type: 'object',
      properties: {
        [definition.kind]: {
          anyOf: [
            withChildren,
            { type: 'null' },
            ...(definition.shorthand ? [{ type: ['string', 'number', 'boolean'] }] : []),
          ],
        },
      },
      required: [definition.kind],
      additionalProperties: false,
    }
  })

  const bare = registry.list(section).map(definition => definition.kind)
  return {
    type: 'array',
    items: { anyOf: [...variants, ...(bare.length > 0 ? [{ type: 'string', enum: bare }] : [])] },
  }
}

/**
 * Generate the recipe JSON Schema for the registry's current kinds
 */
export function generateRecipeSchema(registry: StepRegistryView): Record<string, JsonValue> {
  const definitions: Record<string, unknown> = {}
  for (const section of RECIPE_SECTIONS) {
    definitions[section] = sectionSchema(registry, section)
  }

  const schema = sortKeys({
    $schema: 'http://json-schema.org/draft-07/schema#',
    title: 'Recipe',
    type: 'object',
    properties: {
      read: { $ref: '#/definitions/read' },
      wrangles: { $ref: '#/definitions/wrangles' },
      write: { $ref: '#/definitions/write' },
    },
    additionalProperties: false,
    definitions,
  })
  return typeof schema === 'object' && schema !== null && !Array.isArray(schema) ? schema : {}
}

/**
 * Serialized schema artifact; identical registries give identical text
 */
export function renderRecipeSchema(registry: StepRegistryView): string {
  return `${JSON.stringify(generateRecipeSchema(registry), null, 2)}\n`
}
