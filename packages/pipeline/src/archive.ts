import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { unzipSync } from 'fflate';
import type { OpenDataClient } from './client';
import { StructuralParseError } from './errors';

export interface ArchiveMember {
  name: string;
  content: Uint8Array;
}

function readMembers(bytes: Uint8Array, source: string): ArchiveMember[] {
  let entries: Record<string, Uint8Array>;
  try {
    entries = unzipSync(bytes);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new StructuralParseError(`not a readable ZIP archive (${message})`, { source });
  }
  return Object.entries(entries)
    .filter(([name]) => !name.endsWith('/'))
    .map(([name, content]) => ({ name, content }));
}

/** File name an archive is stored under: its URL path with `/` replaced by `__`. */
export function archiveFileName(uri: string): string {
  return new URL(uri).pathname.replace(/\//g, '__');
}

/**
 * Writes every member of a ZIP archive below `directory` and returns the written paths in
 * archive order.
 */
export async function extractArchive(bytes: Uint8Array, directory: string, source = 'archive'): Promise<string[]> {
  const root = path.resolve(directory);
  const written: string[] = [];
  for (const member of readMembers(bytes, source)) {
    const target = path.resolve(root, member.name);
    if (!target.startsWith(`${root}${path.sep}`)) {
      throw new StructuralParseError(`member ${member.name} escapes the target directory`, { source });
    }
    await mkdir(path.dirname(target), { recursive: true });
    await writeFile(target, member.content);
    written.push(target);
  }
  return written;
}

export async function downloadArchive(client: OpenDataClient, uri: string, directory: string): Promise<string[]> {
  const bytes = await client.fetchBytes(uri);
  await mkdir(directory, { recursive: true });
  await writeFile(path.join(directory, archiveFileName(uri)), bytes);
  return extractArchive(bytes, directory, uri);
}

/**
 * Picks one member of an archive in memory. Without a match the only member is used when
 * there is exactly one.
 */
export function readArchiveMember(
  bytes: Uint8Array,
  predicate: (name: string) => boolean,
  source = 'archive'
): ArchiveMember {
  const members = readMembers(bytes, source);
  const match = members.find((member) => predicate(path.posix.basename(member.name)));
  if (match) {
    return match;
  }
  const [only] = members;
  if (only && members.length === 1) {
    return only;
  }
  throw new StructuralParseError(`no matching member among ${members.length} entries`, { source });
}

export const isMeasurementMember = (name: string): boolean => name.startsWith('produkt');

export const isForecastMember = (name: string): boolean => name.toLowerCase().endsWith('.kml');
