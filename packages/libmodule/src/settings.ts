// libmodule/src/settings.ts
// Environment-driven settings.

import { z } from 'zod';

export type EnvSource = Record<string, string | undefined>;

export class SettingsError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SettingsError';
    }
}

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const settingsSchema = z.object({
    LIBMODULE_LOG_LEVEL: z.enum(LOG_LEVELS).default('warn'),
});

export interface Settings {
    logLevel: LogLevel;
}

function formatIssue(path: ReadonlyArray<string | number>, message: string): string {
    const location = path.length > 0 ? path.join('.') : '<root>';
    return `  • ${location}: ${message}`;
}

/**
 * Read settings from the environment.
 *
 * @throws SettingsError listing every invalid variable
 */
export function loadSettings(env: EnvSource = process.env): Settings {
    const result = settingsSchema.safeParse(env);
    if (!result.success) {
        const details = result.error.issues.map(issue => formatIssue(issue.path, issue.message));
        throw new SettingsError(['Invalid libmodule environment configuration', ...details].join('\n'));
    }
    return { logLevel: result.data.LIBMODULE_LOG_LEVEL };
}
