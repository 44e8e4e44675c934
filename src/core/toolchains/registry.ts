import { ConfigError } from '../../utils/errors.js';
import { cargoToolchain } from './cargo-toolchain.js';
import type { Toolchain } from './types.js';

const toolchains = new Map<string, Toolchain>([[cargoToolchain.name, cargoToolchain]]);

export function registerToolchain(toolchain: Toolchain): void {
  toolchains.set(toolchain.name, toolchain);
}

export function getToolchain(name: string): Toolchain {
  const toolchain = toolchains.get(name);
  if (!toolchain) {
    throw new ConfigError(`Unknown toolchain '${name}'. Available: ${listToolchains().join(', ')}`, { toolchain: name });
  }
  return toolchain;
}

export function listToolchains(): string[] {
  return [...toolchains.keys()].sort();
}
