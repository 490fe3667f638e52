import { createHash } from 'crypto';
import { mkdir, readdir, rm, stat, writeFile } from 'fs/promises';
import { join } from 'path';

export type ArtifactKind = 'audio' | 'letter' | 'video';

export function sha256Hex(input: Buffer): string {
  return createHash('sha256').update(input).digest('hex');
}

function slugifyName(value: string): string {
  const slug = value
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
  return slug || 'kind';
}

function compactDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}${month}${day}`;
}

/** `sinterklaas_<kind>_<child>_<YYYYMMDD>_<id>.<ext>` */
export function artifactFileName(params: {
  kind: ArtifactKind;
  childName: string;
  id: string;
  extension: string;
  date?: Date;
}): string {
  const date = compactDate(params.date ?? new Date());
  return `sinterklaas_${params.kind}_${slugifyName(params.childName)}_${date}_${params.id}.${params.extension}`;
}

export async function writeArtifact(params: {
  directory: string;
  fileName: string;
  body: Buffer;
}): Promise<{ fullPath: string; sizeBytes: number; sha256: string }> {
  await mkdir(params.directory, { recursive: true });

  const fullPath = join(params.directory, params.fileName);
  await writeFile(fullPath, params.body);

  return {
    fullPath,
    sizeBytes: params.body.byteLength,
    sha256: sha256Hex(params.body),
  };
}

export async function cleanupOldArtifacts(
  directory: string,
  retentionHours: number,
  now: number = Date.now(),
): Promise<number> {
  await mkdir(directory, { recursive: true });
  const files = await readdir(directory);
  const cutoffMs = now - retentionHours * 60 * 60 * 1000;
  let deleted = 0;

  for (const file of files) {
    const fullPath = join(directory, file);
    const fileStat = await stat(fullPath);
    if (fileStat.isFile() && fileStat.mtimeMs < cutoffMs) {
      await rm(fullPath, { force: true });
      deleted += 1;
    }
  }

  return deleted;
}
