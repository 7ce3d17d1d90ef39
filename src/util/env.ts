import process from "node:process";
import { assertWordSize, DEFAULT_WORD_SIZE } from "../codec/word.js";
import type { MarshalEnvironment } from "../types/container.js";

/**
 * Environment of the running process: `<arch>-<platform>` as the platform
 * tag, the Node.js version as the version tag, 8-byte words.
 */
export function defaultEnvironment(): MarshalEnvironment {
  return {
    platform: `${process.arch}-${process.platform}`,
    version: process.versions.node,
    wordSize: DEFAULT_WORD_SIZE,
  };
}

/**
 * Fills the missing fields of `overrides` from the default environment.
 */
export function resolveEnvironment(overrides: Partial<MarshalEnvironment> = {}): MarshalEnvironment {
  const defaults = defaultEnvironment();
  const environment: MarshalEnvironment = {
    platform: overrides.platform ?? defaults.platform,
    version: overrides.version ?? defaults.version,
    wordSize: overrides.wordSize ?? defaults.wordSize,
  };
  assertWordSize(environment.wordSize);
  return environment;
}
