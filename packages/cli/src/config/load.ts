import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { parse } from 'yaml';
import { ExplorerConfigSchema, EXPLORER_DEFAULTS, type ExplorerConfig } from '@award-explorer/shared';

/**
 * Loads the explorer configuration (award-explorer.yaml).
 *
 * An explicit path must exist. Without one, the file in the working
 * directory is used when present, otherwise defaults apply.
 */
export function loadConfig(path?: string, cwd: string = process.cwd()): ExplorerConfig {
    const target = path ?? join(cwd, EXPLORER_DEFAULTS.CONFIG_FILENAME);

    if (!existsSync(target)) {
        if (path) {
            throw new Error(`Config file not found: ${path}`);
        }
        return ExplorerConfigSchema.parse({});
    }

    const content = readFileSync(target, 'utf-8');
    const data: unknown = parse(content);

    const result = ExplorerConfigSchema.safeParse(data ?? {});
    if (!result.success) {
        const issues = result.error.issues
            .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
            .join('; ');
        throw new Error(`Invalid config ${target}: ${issues}`);
    }
    return result.data;
}
