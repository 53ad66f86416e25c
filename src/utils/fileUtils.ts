import fs from 'fs/promises';
import path from 'path';
import { glob } from 'fast-glob';

/**
 * Read file content
 */
export async function readFile(filePath: string): Promise<string> {
    return await fs.readFile(filePath, 'utf-8');
}

/**
 * Write content to file
 */
export async function writeFile(filePath: string, content: string): Promise<void> {
    const dir = path.dirname(filePath);
    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(filePath, content, 'utf-8');
}

/**
 * Check if file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
    try {
        await fs.access(filePath);
        return true;
    } catch {
        return false;
    }
}

/**
 * Check if directory exists
 */
export async function dirExists(dirPath: string): Promise<boolean> {
    try {
        const stat = await fs.stat(dirPath);
        return stat.isDirectory();
    } catch {
        return false;
    }
}

interface FindOptions {
    ignore?: string[];
    absolute?: boolean;
    /** Include entries whose name starts with a dot */
    dot?: boolean;
}

/**
 * Find files matching patterns, sorted by path
 */
export async function findFiles(
    directory: string,
    patterns: string | string[],
    options: FindOptions = {}
): Promise<string[]> {
    const { ignore = [], absolute = true, dot = false } = options;

    const files = await glob(patterns, {
        cwd: directory,
        ignore,
        absolute,
        dot,
        onlyFiles: true,
    });
    return files.sort();
}

/**
 * Find directories matching patterns, sorted by path
 */
export async function findDirectories(
    directory: string,
    patterns: string | string[],
    options: FindOptions = {}
): Promise<string[]> {
    const { ignore = [], absolute = true, dot = false } = options;

    const dirs = await glob(patterns, {
        cwd: directory,
        ignore,
        absolute,
        dot,
        onlyDirectories: true,
    });
    return dirs.sort();
}
