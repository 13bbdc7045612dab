import path from 'node:path';
import type { ServiceSettings, StackConfig } from '../config/StackConfig';
import type { ServiceSpec } from '../supervisor/types';

const REQUEST_TIMEOUT_MS = 1500;
const DEPENDENCY_TIMEOUT_MS = 180_000;

type SpecBase = Pick<ServiceSpec,
  'portRange' | 'expectedOwnerNames' | 'host' | 'settleDelayMs' | 'probeIntervalMs' | 'maxWaitMs' |
  'requestTimeoutMs' | 'required' | 'softSuccess' | 'dependencyTimeoutMs'>;

export function baseSpec(config: StackConfig, settings: ServiceSettings): SpecBase {
  return {
    portRange: [ ...settings.ports ],
    expectedOwnerNames: [ ...settings.owners ],
    host: config.host,
    settleDelayMs: settings.settleDelayMs,
    probeIntervalMs: settings.probeIntervalMs,
    maxWaitMs: settings.maxWaitMs,
    requestTimeoutMs: REQUEST_TIMEOUT_MS,
    required: settings.required,
    softSuccess: settings.softSuccess,
    dependencyTimeoutMs: DEPENDENCY_TIMEOUT_MS,
  };
}

/** Configured candidates first, then the built-in ones; unset entries dropped. */
export function candidates(settings: ServiceSettings, ...builtIn: (string | undefined)[]): string[] {
  return [ ...settings.executable, ...builtIn.filter((c): c is string => typeof c === 'string' && c.length > 0) ];
}

export function underHome(home: string | undefined, ...segments: string[]): string | undefined {
  return home ? path.join(home, ...segments) : undefined;
}

export function serviceUrl(host: string, port: number): string {
  return `http://${host}:${port}`;
}

/** Names of the `{name}` placeholders a template uses. */
export function templatePlaceholders(template: string): string[] {
  return [ ...template.matchAll(/\{(\w+)\}/gu) ].map((match) => match[1]);
}

/**
 * Replaces `{name}` placeholders. A placeholder without a value throws, so a
 * command line never carries a literal placeholder.
 */
export function fillTemplate(template: string, values: Record<string, string | undefined>): string {
  return template.replace(/\{(\w+)\}/gu, (_match, key: string) => {
    const value = values[key];
    if (value === undefined) {
      throw new Error(`No value for {${key}} in "${template}"`);
    }
    return value;
  });
}
