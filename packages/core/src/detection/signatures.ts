/**
 * Signature loading and matching.
 *
 * Signature sets are YAML documents validated against SignatureSetSchema. A
 * loaded set is frozen, filtered to the running platform and cached per path,
 * so every session of the process shares the same read-only signatures.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { parse as parseYaml } from 'yaml';
import {
  SignatureSetSchema,
  type MonitoredEvent,
  type Signature,
  type SignaturePattern,
} from '@detonate/shared';
import { toErrorMessage } from '../utils/errors.js';
import { deepFreeze } from '../utils/freeze.js';

export const DEFAULT_SIGNATURES_PATH = fileURLToPath(
  new URL('../../signatures/default.yaml', import.meta.url)
);

const PLATFORM_ALIASES: Readonly<Record<string, string>> = {
  windows: 'win32',
  macos: 'darwin',
  osx: 'darwin',
};

export class SignatureLoadError extends Error {
  readonly path: string;

  constructor(path: string, detail: string, cause?: unknown) {
    super(`Failed to load signatures from ${path}: ${detail}`, { cause });
    this.name = 'SignatureLoadError';
    this.path = path;
  }
}

export interface CompiledSignature {
  readonly signature: Readonly<Signature>;
  readonly indicators: readonly string[];
  readonly regex: RegExp | null;
}

/** Platforms absent, `all`, or naming the platform (aliases such as `windows` accepted). */
export function appliesToPlatform(signature: Signature, platform: NodeJS.Platform): boolean {
  if (!signature.platforms || signature.platforms.length === 0) return true;
  return signature.platforms.some((p) => {
    const name = p.toLowerCase();
    return name === 'all' || (PLATFORM_ALIASES[name] ?? name) === platform;
  });
}

export function compileSignature(signature: Signature): CompiledSignature {
  const frozen = deepFreeze(signature);
  return Object.freeze({
    signature: frozen,
    indicators: Object.freeze((frozen.pattern.indicators ?? []).map((i) => i.toLowerCase())),
    regex: frozen.pattern.regex === undefined ? null : new RegExp(frozen.pattern.regex, 'i'),
  });
}

/** Validate a parsed document and compile the signatures that apply to `platform`. */
export function parseSignatureSet(
  document: unknown,
  platform: NodeJS.Platform = process.platform
): readonly CompiledSignature[] {
  const { signatures } = SignatureSetSchema.parse(document);
  return Object.freeze(signatures.filter((s) => appliesToPlatform(s, platform)).map(compileSignature));
}

const cache = new Map<string, readonly CompiledSignature[]>();

/** Load (once per path and platform) a signature set from YAML. */
export function loadSignatures(
  path: string = DEFAULT_SIGNATURES_PATH,
  platform: NodeJS.Platform = process.platform
): readonly CompiledSignature[] {
  const key = `${platform}:${path}`;
  const cached = cache.get(key);
  if (cached) return cached;

  let compiled: readonly CompiledSignature[];
  try {
    compiled = parseSignatureSet(parseYaml(readFileSync(path, 'utf-8')), platform);
  } catch (err) {
    throw new SignatureLoadError(path, toErrorMessage(err), err);
  }
  cache.set(key, compiled);
  return compiled;
}

/** Test hook: forget loaded signature sets. */
export function clearSignatureCache(): void {
  cache.clear();
}

function eventText(event: MonitoredEvent, pattern: SignaturePattern): string | null {
  if (pattern.field !== undefined) {
    const value = event.attributes[pattern.field];
    return value === undefined || value === null ? null : String(value).toLowerCase();
  }
  return Object.values(event.attributes)
    .filter((v) => v !== null)
    .map(String)
    .join('\n')
    .toLowerCase();
}

export function matchesSignature(compiled: CompiledSignature, event: MonitoredEvent): boolean {
  const { pattern } = compiled.signature;
  if (pattern.category !== undefined && pattern.category !== event.category) return false;

  const text = eventText(event, pattern);
  if (text === null) return false;

  if (compiled.indicators.some((indicator) => text.includes(indicator))) return true;
  return compiled.regex !== null && compiled.regex.test(text);
}
