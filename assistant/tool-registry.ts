/**
 * Tool registry.
 *
 * Built once at startup from an explicit list of descriptors and exposed
 * through a read-only view of frozen descriptors; the backing Map is never
 * handed out, so it cannot be changed after startup.
 * Duplicate or malformed entries fail with ConfigurationError before the
 * pipeline can run.
 */

import { ConfigurationError } from "./errors.js";
import type { ToolDescriptor } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Classifier answer meaning "no tool" */
export const NO_TOOL = "none";

const TOOL_NAME_PATTERN = /^[a-z][a-z0-9_]*$/;

// ============================================================================
// INTERFACES
// ============================================================================

export type ToolRegistry = ReadonlyMap<string, Readonly<ToolDescriptor>>;

// ============================================================================
// MAIN ENTRYPOINT
// ============================================================================

/**
 * Build the registry.
 *
 * @param descriptors - Every tool the assistant may run
 * @returns An immutable name -> descriptor map
 * @throws ConfigurationError on duplicate names, reserved or malformed names,
 *   or an extraction strategy naming an unknown parameter
 */
export function buildToolRegistry(descriptors: readonly ToolDescriptor[]): ToolRegistry {
  const map = new Map<string, Readonly<ToolDescriptor>>();

  for (const descriptor of descriptors) {
    validateDescriptor(descriptor);
    if (map.has(descriptor.name)) {
      throw new ConfigurationError(`duplicate tool name "${descriptor.name}"`);
    }
    map.set(descriptor.name, Object.freeze({ ...descriptor, parameters: Object.freeze({ ...descriptor.parameters }) }));
  }

  return Object.freeze(new ReadonlyToolMap(map));
}

/**
 * One "name: description" line per tool, in registration order.
 * Used by the classifier prompt.
 */
export function describeTools(registry: ToolRegistry): string {
  return [...registry.values()].map((tool) => `- ${tool.name}: ${tool.description}`).join("\n");
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/** Read-only view over the registry's private Map */
class ReadonlyToolMap implements ToolRegistry {
  private readonly tools: Map<string, Readonly<ToolDescriptor>>;

  constructor(tools: Map<string, Readonly<ToolDescriptor>>) {
    this.tools = tools;
  }

  get size(): number {
    return this.tools.size;
  }

  get(name: string): Readonly<ToolDescriptor> | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  forEach(callback: (value: Readonly<ToolDescriptor>, key: string, map: ToolRegistry) => void): void {
    this.tools.forEach((value, key) => callback(value, key, this));
  }

  entries() {
    return this.tools.entries();
  }

  keys() {
    return this.tools.keys();
  }

  values() {
    return this.tools.values();
  }

  [Symbol.iterator]() {
    return this.tools[Symbol.iterator]();
  }
}

function validateDescriptor(descriptor: ToolDescriptor): void {
  const { name } = descriptor;
  if (!TOOL_NAME_PATTERN.test(name)) {
    throw new ConfigurationError(`tool name "${name}" must be lower snake case`);
  }
  if (name === NO_TOOL) {
    throw new ConfigurationError(`tool name "${NO_TOOL}" is reserved`);
  }
  if (descriptor.description.trim() === "") {
    throw new ConfigurationError(`tool "${name}" has no description`);
  }
  const strategy = descriptor.extraction;
  if (strategy?.kind === "single_value" && !(strategy.parameter in descriptor.parameters)) {
    throw new ConfigurationError(`tool "${name}" extracts unknown parameter "${strategy.parameter}"`);
  }
}
