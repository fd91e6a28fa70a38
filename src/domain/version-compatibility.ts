import semver from 'semver';
import { z } from 'zod';
import { ok, err, type Result } from 'neverthrow';
import type { Brand } from '../runtime/brand.js';
import type { Logger } from '../core/logging/types.js';
import { Err } from '../core/errors/factories.js';
import type { ConfigInvalidError, VersionIncompatibleError } from '../core/errors/cache-error.js';
import type { Manifest } from './manifest.js';
import { CLIENT_NAME, CLIENT_VERSION } from '../version.js';

// =============================================================================
// Compatibility table
// =============================================================================

/** `[min inclusive, max exclusive)` */
export type VersionRange = readonly [string, string];

export interface CompatibilityTable {
  /** pipeline version -> consumer name -> accepted client range */
  readonly pipelineVersions: Readonly<Record<string, Readonly<Record<string, VersionRange>>>>;
}

/**
 * Releases written by pipeline 2.9.x/2.10.x are readable by clients in
 * [2.9.0, 3.0.0).
 */
export const DEFAULT_COMPATIBILITY: CompatibilityTable = {
  pipelineVersions: {
    '2.9.0': { [CLIENT_NAME]: ['2.9.0', '3.0.0'] },
    '2.10.0': { [CLIENT_NAME]: ['2.9.0', '3.0.0'] },
  },
};

const SemverString = z.string().refine((v) => semver.valid(v) !== null, { message: 'not a semantic version' });

/**
 * Wire form of an externally supplied table:
 * `{ "pipeline_versions": { "2.10.0": { "<consumer>": ["2.9.0", "3.0.0"] } } }`
 */
export const CompatibilityTableSchema = z.object({
  pipeline_versions: z.record(z.record(z.tuple([SemverString, SemverString]))),
});

export function parseCompatibilityTable(raw: unknown): Result<CompatibilityTable, ConfigInvalidError> {
  const parsed = CompatibilityTableSchema.safeParse(raw);
  if (!parsed.success) {
    return err(Err.configInvalid(parsed.error.errors.map((issue) => ({
      path: ['compatibility', ...issue.path].join('.'),
      message: issue.message,
    }))));
  }
  return ok({ pipelineVersions: parsed.data.pipeline_versions });
}

// =============================================================================
// Checked manifest (proof the gate ran)
// =============================================================================

export type CompatibilityOutcome =
  | { readonly kind: 'verified'; readonly pipelineVersion: string; readonly range: VersionRange }
  | { readonly kind: 'skipped'; readonly reason: string };

export interface CheckedManifestShape {
  readonly manifest: Manifest;
  readonly compatibility: CompatibilityOutcome;
}

/**
 * Only the checker mints this; table loads and downloads require it.
 */
export type CheckedManifest = Brand<CheckedManifestShape, 'CheckedManifest'>;

export type VersionCheckPolicy =
  | { readonly kind: 'enforce' }
  | { readonly kind: 'skip'; readonly reason: string };

export interface VersionCompatibilityCheckerOptions {
  readonly table?: CompatibilityTable;
  readonly consumer?: string;
  readonly clientVersion?: string;
  readonly logger?: Logger;
}

export class VersionCompatibilityChecker {
  private readonly table: CompatibilityTable;
  private readonly consumer: string;
  private readonly clientVersion: string;
  private readonly logger: Logger | undefined;

  constructor(options: VersionCompatibilityCheckerOptions = {}) {
    this.table = options.table ?? DEFAULT_COMPATIBILITY;
    this.consumer = options.consumer ?? CLIENT_NAME;
    this.clientVersion = options.clientVersion ?? CLIENT_VERSION;
    this.logger = options.logger;
  }

  check(
    manifest: Manifest,
    policy: VersionCheckPolicy = { kind: 'enforce' }
  ): Result<CheckedManifest, VersionIncompatibleError> {
    if (policy.kind === 'skip') {
      this.logger?.warn(
        { project: manifest.project, version: manifest.version, reason: policy.reason, consumer: this.consumer },
        'version compatibility check skipped by caller'
      );
      return ok(brand({ manifest, compatibility: { kind: 'skipped', reason: policy.reason } }));
    }

    const fail = (reason: string, extra: { pipelineVersion?: string; range?: VersionRange } = {}) =>
      err(Err.versionIncompatible({
        project: manifest.project,
        version: manifest.version,
        consumer: this.consumer,
        clientVersion: this.clientVersion,
        reason,
        ...extra,
      }));

    const client = semver.parse(this.clientVersion);
    if (client === null) {
      return fail(`client version "${this.clientVersion}" is not a semantic version`);
    }

    const entries = manifest.pipeline.filter((p) => p.name === this.consumer);
    if (entries.length !== 1) {
      return fail(`expected 1 and only 1 data_pipeline entry for "${this.consumer}", found ${entries.length}`);
    }

    const pipelineVersion = entries[0]?.version ?? '';
    const limits = this.table.pipelineVersions[pipelineVersion]?.[this.consumer];
    if (limits === undefined) {
      return fail(`no version compatibility listed for pipeline version ${pipelineVersion}`, { pipelineVersion });
    }

    const [min, max] = limits;
    if (semver.lt(client, min) || semver.gte(client, max)) {
      return fail(`client ${this.clientVersion} is outside [${min}, ${max})`, { pipelineVersion, range: limits });
    }

    this.logger?.debug({ project: manifest.project, version: manifest.version, pipelineVersion }, 'manifest compatible');
    return ok(brand({ manifest, compatibility: { kind: 'verified', pipelineVersion, range: limits } }));
  }
}

function brand(shape: CheckedManifestShape): CheckedManifest {
  return shape as CheckedManifest;
}
