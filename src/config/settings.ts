// src/config/settings.ts

import * as fs from 'node:fs';
import * as path from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import type { ISettings, SettingsOverrides } from '../@types/index.ts';
import { config, defaultSettings } from './index.ts';
import { InputError } from '../utils/errors/errors.ts';

const settingsSchema = z
    .object({
        basedir: z.string().min(1),
        baseurl: z.string().url(),
        rangebegin: z.coerce.number().int().min(1),
        rangeend: z.coerce.number().int().min(1),
        sleeptime: z.coerce.number().min(0),
    })
    .refine((settings) => settings.rangeend >= settings.rangebegin, {
        message: 'rangeend must not be lower than rangebegin',
        path: ['rangeend'],
    });

const fileSchema = settingsSchema.innerType().partial().strict();

const settingKeys = ['basedir', 'baseurl', 'rangebegin', 'rangeend', 'sleeptime'] as const;

export interface ILoadSettingsOptions {
    /** Explicit settings file; it must exist when given. */
    configPath?: string;
    env?: NodeJS.ProcessEnv;
    cwd?: string;
    overrides?: SettingsOverrides;
}

/**
 * Reads a YAML settings file. A missing file at the default location yields no settings.
 */
function readSettingsFile(filePath: string, required: boolean): Record<string, unknown> {
    if (!fs.existsSync(filePath)) {
        if (required) {
            throw new InputError(`Settings file "${filePath}" does not exist.`);
        }
        return {};
    }
    let parsed: unknown;
    try {
        parsed = YAML.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error) {
        throw new InputError(`Settings file "${filePath}" is not valid YAML.`, { cause: error });
    }
    if (parsed === null || parsed === undefined) {
        return {};
    }
    const result = fileSchema.safeParse(parsed);
    if (!result.success) {
        throw new InputError(`Settings file "${filePath}" is invalid: ${formatIssues(result.error)}`);
    }
    return result.data;
}

function readEnvironment(env: NodeJS.ProcessEnv): Record<string, unknown> {
    const values: Record<string, unknown> = {};
    for (const key of settingKeys) {
        const value = env[`${config.envPrefix}${key.toUpperCase()}`];
        if (value !== undefined && value !== '') {
            values[key] = value;
        }
    }
    return values;
}

function formatIssues(error: z.ZodError): string {
    return error.issues.map((issue) => `${issue.path.join('.') || 'settings'}: ${issue.message}`).join('; ');
}

/**
 * Resolves settings from defaults, the YAML settings file, `FOLIO_*` environment variables
 * and explicit overrides, in increasing order of precedence.
 *
 * @param options - Where to look for the settings file and which overrides to apply.
 * @throws {InputError} When a layer cannot be read or the merged settings are invalid.
 */
export function loadSettings(options: ILoadSettingsOptions = {}): ISettings {
    const env = options.env ?? process.env;
    const cwd = options.cwd ?? process.cwd();
    const explicitPath = options.configPath ?? env[`${config.envPrefix}CONFIG`];
    const filePath = explicitPath ? path.resolve(cwd, explicitPath) : path.join(cwd, config.settingsFile);

    const overrides = Object.fromEntries(
        Object.entries(options.overrides ?? {}).filter(([, value]) => value !== undefined),
    );
    const merged = {
        ...defaultSettings,
        ...readSettingsFile(filePath, Boolean(explicitPath)),
        ...readEnvironment(env),
        ...overrides,
    };

    const result = settingsSchema.safeParse(merged);
    if (!result.success) {
        throw new InputError(`Invalid settings: ${formatIssues(result.error)}`);
    }
    return result.data;
}
