import { z } from 'zod';
import { ok, err, type Result } from 'neverthrow';
import { Err } from '../core/errors/factories.js';
import type { ManifestInvalidError } from '../core/errors/cache-error.js';
import {
  asFileId,
  asManifestVersion,
  asSha256Hex,
  isSha256Hex,
  isValidFileId,
  type FileId,
  type ManifestVersion,
  type Sha256Hex,
} from './ids.js';

// =============================================================================
// Wire schema (snake_case, as published next to the release)
// =============================================================================

const FileEntrySchema = z
  .object({
    url: z.string().min(1),
    version_id: z.string().nullish(),
    file_hash: z.string().nullish(),
  })
  .passthrough();

const PipelineEntrySchema = z
  .object({
    name: z.string().min(1),
    version: z.string().min(1),
    comment: z.string().nullish(),
  })
  .passthrough();

/**
 * Unknown top-level keys pass through: newer releases may add fields an
 * older client does not know about.
 */
export const ManifestWireSchema = z
  .object({
    project_name: z.string().min(1),
    manifest_version: z.string().min(1),
    metadata_file_id_column_name: z.string().min(1),
    data_pipeline: z.array(PipelineEntrySchema),
    metadata_files: z.record(FileEntrySchema),
    data_files: z.record(FileEntrySchema),
  })
  .passthrough();

export type ManifestWire = z.infer<typeof ManifestWireSchema>;

// =============================================================================
// Domain model
// =============================================================================

export interface ManifestFileEntry {
  /** Object key inside the bucket (URL reduced to its path). */
  readonly key: string;
  readonly url: string;
  readonly versionId?: string;
  /** Declared sha256; absent when the manifest carries none or another algorithm. */
  readonly sha256?: Sha256Hex;
}

export interface PipelineVersion {
  readonly name: string;
  readonly version: string;
  readonly comment?: string;
}

export interface Manifest {
  readonly project: string;
  readonly version: ManifestVersion;
  /** Column linking a metadata row to an entry of `dataFiles`. */
  readonly fileIdColumn: string;
  readonly pipeline: readonly PipelineVersion[];
  readonly metadataFiles: ReadonlyMap<string, ManifestFileEntry>;
  readonly dataFiles: ReadonlyMap<FileId, ManifestFileEntry>;
}

/**
 * Reduce a manifest URL to an object key.
 *
 * - `s3://bucket/a/b.nwb`                   -> `a/b.nwb`
 * - `https://bucket.s3.amazonaws.com/a/b`   -> `a/b`
 * - `a/b.nwb`                               -> `a/b.nwb`
 */
export function keyFromUrl(url: string): Result<string, string> {
  const s3 = /^s3:\/\/[^/]+\/(.+)$/.exec(url);
  if (s3?.[1] !== undefined) return ok(s3[1]);

  if (/^https?:\/\//.test(url)) {
    try {
      return ok(decodeURIComponent(new URL(url).pathname.replace(/^\/+/, '')));
    } catch (e) {
      return err(`malformed URL "${url}": ${e instanceof Error ? e.message : String(e)}`);
    }
  }

  return ok(url.replace(/^\/+/, ''));
}

function toFileEntry(raw: z.infer<typeof FileEntrySchema>): Result<ManifestFileEntry, string> {
  const hash = raw.file_hash?.toLowerCase();
  return keyFromUrl(raw.url).map((key) => ({
    key,
    url: raw.url,
    ...(raw.version_id ? { versionId: raw.version_id } : {}),
    ...(hash !== undefined && isSha256Hex(hash) ? { sha256: asSha256Hex(hash) } : {}),
  }));
}

export interface ExpectedManifestIdentity {
  readonly project: string;
  readonly version: string;
}

/**
 * Parse manifest text. The manifest must describe the project and version it
 * was requested as.
 */
export function parseManifest(
  text: string,
  expected: ExpectedManifestIdentity
): Result<Manifest, ManifestInvalidError> {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (e) {
    return err(Err.manifestInvalid(expected.project, expected.version, [
      `not valid JSON: ${e instanceof Error ? e.message : String(e)}`,
    ]));
  }

  const parsed = ManifestWireSchema.safeParse(raw);
  if (!parsed.success) {
    return err(Err.manifestInvalid(
      expected.project,
      expected.version,
      parsed.error.errors.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    ));
  }

  const wire = parsed.data;
  const issues: string[] = [];
  if (wire.project_name !== expected.project) {
    issues.push(`project_name is "${wire.project_name}", expected "${expected.project}"`);
  }
  if (wire.manifest_version !== expected.version) {
    issues.push(`manifest_version is "${wire.manifest_version}", expected "${expected.version}"`);
  }

  const dataFiles = new Map<FileId, ManifestFileEntry>();
  for (const [id, entry] of Object.entries(wire.data_files)) {
    if (!isValidFileId(id)) {
      issues.push(`data_files key "${id}" is not a valid file id`);
      continue;
    }
    const fileEntry = toFileEntry(entry);
    if (fileEntry.isErr()) issues.push(`data_files.${id}.url: ${fileEntry.error}`);
    else dataFiles.set(asFileId(id), fileEntry.value);
  }

  const metadataFiles = new Map<string, ManifestFileEntry>();
  for (const [name, entry] of Object.entries(wire.metadata_files)) {
    const fileEntry = toFileEntry(entry);
    if (fileEntry.isErr()) issues.push(`metadata_files.${name}.url: ${fileEntry.error}`);
    else metadataFiles.set(name, fileEntry.value);
  }

  if (issues.length > 0) {
    return err(Err.manifestInvalid(expected.project, expected.version, issues));
  }

  return ok({
    project: wire.project_name,
    version: asManifestVersion(wire.manifest_version),
    fileIdColumn: wire.metadata_file_id_column_name,
    pipeline: wire.data_pipeline.map((p) => ({
      name: p.name,
      version: p.version,
      ...(p.comment ? { comment: p.comment } : {}),
    })),
    metadataFiles,
    dataFiles,
  });
}

export function metadataTableNames(manifest: Manifest): readonly string[] {
  return [...manifest.metadataFiles.keys()].sort();
}
