import path from 'path';
import process from 'process';
import os from 'os';
import fs from 'fs';
import { z } from 'zod';
import { LOG_LEVELS, type LogLevel } from './utils/logger.js';

export const CONFIG_FILE = path.join(process.cwd(), 'config.json');

export const DEFAULT_MAX_FILE_SIZE = 10 * 1024 * 1024; // 10MB
export const DEFAULT_MAX_OPERATIONS = 1000;

export interface ServerConfig {
    /** Every file the server touches must resolve inside this directory. */
    basePath: string;
    maxFileSize: number;
    maxOperations: number;
    /** Write the text reached before a failing edit instead of discarding it. */
    persistPartialEdits: boolean;
    logLevel: LogLevel;
}

export const ConfigFileSchema = z.object({
    basePath: z.string().optional(),
    maxFileSize: z.number().int().positive().optional(),
    maxOperations: z.number().int().positive().optional(),
    persistPartialEdits: z.boolean().optional(),
    logLevel: z.enum(LOG_LEVELS).optional(),
}).strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface CliOptions {
    basePath?: string;
    configFile?: string;
    logLevel?: string;
}

/**
 * Parse `--base-path <dir>`, `--config <file>` and `--log-level <level>`.
 * Both `--flag value` and `--flag=value` are accepted.
 */
export function parseArgs(argv: readonly string[]): CliOptions {
    const options: CliOptions = {};
    const flags: Record<string, keyof CliOptions> = {
        '--base-path': 'basePath',
        '--config': 'configFile',
        '--log-level': 'logLevel',
    };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        const eq = arg.indexOf('=');
        const flag = eq === -1 ? arg : arg.slice(0, eq);
        const key = flags[flag];
        if (key === undefined) {
            throw new Error(`Unknown argument: ${arg}`);
        }

        let value: string | undefined;
        if (eq !== -1) {
            value = arg.slice(eq + 1);
        } else {
            value = argv[i + 1];
            i++;
        }
        if (value === undefined || value === '') {
            throw new Error(`Missing value for ${flag}`);
        }
        options[key] = value;
    }

    return options;
}

export function expandHome(dir: string): string {
    if (dir === '~' || dir.startsWith('~/') || dir.startsWith('~\\')) {
        return path.join(os.homedir(), dir.slice(1));
    }
    return dir;
}

/**
 * Read and validate a JSON config file. A missing default config file is
 * not an error; a missing explicit one is.
 */
export function readConfigFile(file: string, required: boolean): ConfigFile {
    if (!fs.existsSync(file)) {
        if (required) {
            throw new Error(`Config file not found: ${file}`);
        }
        return {};
    }

    const raw = fs.readFileSync(file, 'utf8');
    let json: unknown;
    try {
        json = JSON.parse(raw);
    } catch (error) {
        throw new Error(`Config file ${file} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }

    const parsed = ConfigFileSchema.safeParse(json);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        throw new Error(`Invalid config file ${file}: ${issues.join('; ')}`);
    }
    return parsed.data;
}

/**
 * Build the server configuration. Command line values win over the config
 * file, which wins over defaults.
 */
export function loadConfig(argv: readonly string[]): ServerConfig {
    const cli = parseArgs(argv);
    const file = cli.configFile
        ? readConfigFile(path.resolve(expandHome(cli.configFile)), true)
        : readConfigFile(CONFIG_FILE, false);

    const basePath = cli.basePath ?? file.basePath;
    if (!basePath) {
        throw new Error('A base directory is required: pass --base-path <dir> or set basePath in the config file');
    }

    const resolvedBase = path.resolve(expandHome(basePath));
    if (!fs.existsSync(resolvedBase) || !fs.statSync(resolvedBase).isDirectory()) {
        throw new Error(`Base path does not exist or is not a directory: ${basePath}`);
    }

    let logLevel: LogLevel = file.logLevel ?? 'info';
    if (cli.logLevel !== undefined) {
        const parsedLevel = z.enum(LOG_LEVELS).safeParse(cli.logLevel);
        if (!parsedLevel.success) {
            throw new Error(`Invalid log level: ${cli.logLevel}. Expected one of ${LOG_LEVELS.join(', ')}`);
        }
        logLevel = parsedLevel.data;
    }

    return {
        basePath: resolvedBase,
        maxFileSize: file.maxFileSize ?? DEFAULT_MAX_FILE_SIZE,
        maxOperations: file.maxOperations ?? DEFAULT_MAX_OPERATIONS,
        persistPartialEdits: file.persistPartialEdits ?? false,
        logLevel,
    };
}
