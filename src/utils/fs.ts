import { promises as fs } from 'fs';
import path from 'path';
import crypto from 'crypto';

export async function ensureDir(dirPath: string): Promise<void> {
    await fs.mkdir(dirPath, { recursive: true });
}

/** File contents, or null when the file does not exist. Other errors propagate. */
export async function readTextIfExists(filePath: string): Promise<string | null> {
    try {
        return await fs.readFile(filePath, 'utf8');
    } catch (e) {
        if (e instanceof Error && 'code' in e && e.code === 'ENOENT') return null;
        throw e;
    }
}

/**
 * Writes beside the target and renames over it, so readers see either the
 * old file or the new one.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
    const dir = path.dirname(filePath);
    await ensureDir(dir);
    const tmpPath = path.join(dir, `.${path.basename(filePath)}.${process.pid}.${crypto.randomUUID()}.tmp`);
    try {
        await fs.writeFile(tmpPath, content, 'utf8');
        await fs.rename(tmpPath, filePath);
    } catch (e) {
        await fs.rm(tmpPath, { force: true });
        throw e;
    }
}

export async function truncateFile(filePath: string, byteLength: number): Promise<void> {
    await fs.truncate(filePath, byteLength);
}

export async function appendLines(filePath: string, lines: string[]): Promise<void> {
    if (lines.length === 0) return;
    await ensureDir(path.dirname(filePath));
    await fs.appendFile(filePath, lines.map(line => `${line}\n`).join(''), 'utf8');
}
