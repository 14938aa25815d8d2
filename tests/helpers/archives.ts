import { promises as fs } from 'fs';
import { dirname, join } from 'path';
import * as tar from 'tar';
import { xz } from '@napi-rs/lzma';

/**
 * Build an archive in memory from a map of relative paths to file contents.
 * `modes` sets permission bits on individual files before packing.
 */
export async function buildTarArchive(
  workDir: string,
  files: Record<string, string>,
  kind: 'tar.gz' | 'tar.xz' = 'tar.xz',
  modes: Record<string, number> = {}
): Promise<Buffer> {
  const sourceDir = await fs.mkdtemp(join(workDir, 'archive-src-'));
  for (const [relativePath, content] of Object.entries(files)) {
    const filePath = join(sourceDir, relativePath);
    await fs.mkdir(dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content, 'utf8');
    const mode = modes[relativePath];
    if (mode !== undefined) await fs.chmod(filePath, mode);
  }

  const topLevel = [...new Set(Object.keys(files).map(path => path.split('/')[0]))];
  const tarPath = `${sourceDir}.tar${kind === 'tar.gz' ? '.gz' : ''}`;
  await tar.c({ cwd: sourceDir, file: tarPath, gzip: kind === 'tar.gz' }, topLevel);
  const archive = await fs.readFile(tarPath);

  await fs.rm(sourceDir, { recursive: true, force: true });
  await fs.rm(tarPath, { force: true });
  return kind === 'tar.xz' ? xz.compress(archive) : archive;
}

const CRC_TABLE = Array.from({ length: 256 }, (_, n) => {
  let c = n;
  for (let k = 0; k < 8; k++) c = c & 1 ? 0xedb88320 ^ (c >>> 1) : c >>> 1;
  return c >>> 0;
});

function crc32(data: Buffer): number {
  let crc = 0xffffffff;
  for (const byte of data) crc = CRC_TABLE[(crc ^ byte) & 0xff] ^ (crc >>> 8);
  return (crc ^ 0xffffffff) >>> 0;
}

export interface ZipEntry {
  name: string;
  content: string;
  /** Unix permission bits stored in the external attributes */
  mode?: number;
}

/**
 * Uncompressed (stored) zip written by hand, created by a Unix host so the
 * entries carry their permission bits.
 */
export function buildZipArchive(entries: readonly ZipEntry[]): Buffer {
  const DOS_DATE_1980_01_01 = 0x21;
  const locals: Buffer[] = [];
  const centrals: Buffer[] = [];
  let offset = 0;

  for (const entry of entries) {
    const name = Buffer.from(entry.name, 'utf8');
    const data = Buffer.from(entry.content, 'utf8');
    const crc = crc32(data);

    const local = Buffer.alloc(30);
    local.writeUInt32LE(0x04034b50, 0);
    local.writeUInt16LE(20, 4);
    local.writeUInt16LE(0, 6);
    local.writeUInt16LE(0, 8);
    local.writeUInt16LE(0, 10);
    local.writeUInt16LE(DOS_DATE_1980_01_01, 12);
    local.writeUInt32LE(crc, 14);
    local.writeUInt32LE(data.length, 18);
    local.writeUInt32LE(data.length, 22);
    local.writeUInt16LE(name.length, 26);
    local.writeUInt16LE(0, 28);

    const central = Buffer.alloc(46);
    central.writeUInt32LE(0x02014b50, 0);
    central.writeUInt16LE((3 << 8) | 20, 4);
    central.writeUInt16LE(20, 6);
    central.writeUInt16LE(0, 8);
    central.writeUInt16LE(0, 10);
    central.writeUInt16LE(0, 12);
    central.writeUInt16LE(DOS_DATE_1980_01_01, 14);
    central.writeUInt32LE(crc, 16);
    central.writeUInt32LE(data.length, 20);
    central.writeUInt32LE(data.length, 24);
    central.writeUInt16LE(name.length, 28);
    central.writeUInt16LE(0, 30);
    central.writeUInt16LE(0, 32);
    central.writeUInt16LE(0, 34);
    central.writeUInt16LE(0, 36);
    central.writeUInt32LE(((0o100000 | (entry.mode ?? 0o644)) << 16) >>> 0, 38);
    central.writeUInt32LE(offset, 42);

    locals.push(local, name, data);
    centrals.push(central, name);
    offset += local.length + name.length + data.length;
  }

  const directory = Buffer.concat(centrals);
  const end = Buffer.alloc(22);
  end.writeUInt32LE(0x06054b50, 0);
  end.writeUInt16LE(0, 4);
  end.writeUInt16LE(0, 6);
  end.writeUInt16LE(entries.length, 8);
  end.writeUInt16LE(entries.length, 10);
  end.writeUInt32LE(directory.length, 12);
  end.writeUInt32LE(offset, 16);
  end.writeUInt16LE(0, 20);

  return Buffer.concat([...locals, directory, end]);
}
