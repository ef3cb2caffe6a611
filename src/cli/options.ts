import { InvalidArgumentError } from 'commander';
import type { ListingSourceKind, LlmProviderKind, LogLevel, Tier } from '../types/index.js';
import { EXPORT_FORMATS, type ExportFormat } from '../exporters/export.js';
import { TIERS } from '../scoring/tiers.js';
import type { ConfigOverrides } from '../utils/config.js';

// ─── Option parsers ───────────────────────────────────────

export function parseInteger(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed)) {
        throw new InvalidArgumentError(`Not an integer: ${value}`);
    }
    return parsed;
}

export function parseNumber(value: string): number {
    const parsed = Number(value);
    if (value.trim() === '' || !Number.isFinite(parsed)) {
        throw new InvalidArgumentError(`Not a number: ${value}`);
    }
    return parsed;
}

/**
 * Accepts a tier name in any case, with hyphens for spaces (`hidden-gem`).
 */
export function parseTier(value: string): Tier {
    const needle = value.trim().toLowerCase().replace(/-/g, ' ');
    const tier = TIERS.find((t) => t.toLowerCase() === needle);
    if (!tier) {
        throw new InvalidArgumentError(`Unknown tier: ${value}. Valid: ${TIERS.join(', ')}`);
    }
    return tier;
}

export function parseExportFormat(value: string): ExportFormat {
    const format = EXPORT_FORMATS.find((f) => f === value.toLowerCase());
    if (!format) {
        throw new InvalidArgumentError(`Invalid format: ${value}. Valid: ${EXPORT_FORMATS.join(', ')}`);
    }
    return format;
}

function oneOf<T extends string>(allowed: readonly T[], label: string) {
    return (value: string): T => {
        const match = allowed.find((a) => a === value);
        if (!match) {
            throw new InvalidArgumentError(`Invalid ${label}: ${value}. Valid: ${allowed.join(', ')}`);
        }
        return match;
    };
}

export const parseSource = oneOf<ListingSourceKind>(['places', 'synthetic'], 'source');
export const parseProvider = oneOf<LlmProviderKind>(['openai', 'ollama'], 'provider');
export const parseLogLevel = oneOf<LogLevel>(['error', 'warn', 'info', 'debug', 'silent'], 'log level');

// ─── Flag → config mapping ────────────────────────────────

/**
 * Options shared by every command that loads configuration.
 */
export interface GlobalOptions {
    db?: string;
    configDir?: string;
    logLevel?: LogLevel;
    jsonLogs?: boolean;
}

export interface CollectOptions {
    source?: ListingSourceKind;
    limit?: number;
    concurrency?: number;
    rps?: number;
    spacing?: number;
    extraSeeds?: string;
    retryFailed?: boolean;
}

export interface ScoreOptions {
    classify?: boolean;
    provider?: LlmProviderKind;
    model?: string;
    maxCvRmse?: number;
    seed?: number;
    /** Forget stored classifier answers before scoring */
    reclassify?: boolean;
}

/**
 * Map parsed flags onto the configuration layers. Flags left unset stay
 * `undefined` and do not override lower layers.
 */
export function buildOverrides(opts: GlobalOptions & CollectOptions & ScoreOptions): ConfigOverrides {
    return {
        db: opts.db,
        logLevel: opts.logLevel,
        jsonLogs: opts.jsonLogs,
        seeds: {
            spacingM: opts.spacing,
            extraSeedsFile: opts.extraSeeds,
        },
        collector: {
            source: opts.source,
            limit: opts.limit,
            concurrency: opts.concurrency,
            requestsPerSecond: opts.rps,
            retryFailed: opts.retryFailed,
        },
        classifier: {
            enabled: opts.classify,
            provider: opts.provider,
            model: opts.model,
        },
        model: {
            maxCvRmse: opts.maxCvRmse,
            seed: opts.seed,
        },
    };
}
