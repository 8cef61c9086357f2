import { InvalidArgumentError } from 'commander';
import type { LogLevel } from '../types/index.js';
import { parseLogLevel } from '../utils/logger.js';
import { EXPORT_FORMATS, isExportFormat, type ExportFormat } from '../exporters/export.js';

// Argument parsers for commander options

export function parsePositiveInt(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 1) {
        throw new InvalidArgumentError('Must be a positive integer.');
    }
    return parsed;
}

export function parseLogLevelOption(value: string): LogLevel {
    const level = parseLogLevel(value.toLowerCase());
    if (!level) {
        throw new InvalidArgumentError('Valid levels: error, warn, info, debug, silent.');
    }
    return level;
}

export function parseExportFormat(value: string): ExportFormat {
    const format = value.toLowerCase();
    if (!isExportFormat(format)) {
        throw new InvalidArgumentError(`Valid formats: ${EXPORT_FORMATS.join(', ')}.`);
    }
    return format;
}
