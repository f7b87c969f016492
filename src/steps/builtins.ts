/**
 * Built-in step kinds, registered once at start-up
 */

import { MemoryStore } from '../connectors/memory-connector'
import { StepRegistry } from '../registry/step-registry'
import { columnWrangles } from './column-wrangles'
import { extractWrangles } from './extract-wrangles'
import { flowWrangles } from './flow-wrangles'
import { registerIoSteps, type IoDependencies } from './io-steps'
import { customWrangle, predictWrangle } from './model-wrangles'
import { textWrangles } from './text-wrangles'

export type BuiltinDependencies = Partial<IoDependencies>

/**
 * Register every built-in kind. A built-in registered twice is a conflict,
 * never a silent replacement.
 */
export function registerBuiltinSteps(registry: StepRegistry, deps: BuiltinDependencies = {}): StepRegistry {
  registerIoSteps(registry, { ...deps, memoryStore: deps.memoryStore ?? new MemoryStore() })
  for (const definition of [...textWrangles, ...columnWrangles, ...extractWrangles, ...flowWrangles]) {
    registry.register(definition)
  }
  registry.register(predictWrangle(deps.fetch))
  registry.register(customWrangle)
  return registry
}

/**
 * A frozen registry holding the built-ins
 */
export function createBuiltinRegistry(deps: BuiltinDependencies = {}): StepRegistry {
  return registerBuiltinSteps(new StepRegistry(), deps).freeze()
}
