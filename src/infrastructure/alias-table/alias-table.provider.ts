// src/infrastructure/alias-table/alias-table.provider.ts
import { promises as fs } from 'fs';
import 'reflect-metadata';
import { inject, injectable, singleton } from 'tsyringe';
import winston from 'winston';
import { parse as parseYaml } from 'yaml';

import config from '../../config';
import { AppError, ConfigurationError } from '../../core/common/errors';
import { GeographyNormalizer, IAliasTableSource } from '../../core/geography';
import { LOGGER_TOKEN } from '../logger';

/**
 * Holds the district alias table for the lifetime of the process.
 *
 * The normalizer it hands out is immutable. `reload()` builds a complete replacement
 * before swapping the reference, so a failed reload leaves the previous table in force
 * and runs already holding a snapshot are unaffected.
 */
@singleton()
@injectable()
export class AliasTableProvider implements IAliasTableSource {

    private normalizer: GeographyNormalizer = GeographyNormalizer.empty();
    private loaded = false;

    constructor(@inject(LOGGER_TOKEN) private readonly logger: winston.Logger) {
        this.logger.info('AliasTableProvider initialized.');
    }

    current(): GeographyNormalizer {
        if (!this.loaded) {
            this.logger.warn('AliasTableProvider: current() called before load(); resolving against an empty table.');
        }
        return this.normalizer;
    }

    /**
     * Loads the alias table at startup.
     * A missing file is not fatal: every district then passes through unchanged.
     * @throws {ConfigurationError} if the file exists but cannot be parsed or is malformed
     */
    async load(filePath: string = config.aliasTablePath): Promise<GeographyNormalizer> {
        this.normalizer = await this.readTable(filePath);
        this.loaded = true;
        return this.normalizer;
    }

    /** Re-reads the table and swaps it in. On failure the previous table stays in force. */
    async reload(filePath: string = config.aliasTablePath): Promise<boolean> {
        try {
            const next = await this.readTable(filePath);
            this.normalizer = next;
            this.loaded = true;
            this.logger.info(`AliasTableProvider: Alias table reloaded (${next.ruleCount} rules).`);
            return true;
        } catch (error) {
            this.logger.error('AliasTableProvider: Reload failed, keeping the previous alias table.', {
                message: error instanceof Error ? error.message : String(error),
            });
            return false;
        }
    }

    private async readTable(filePath: string): Promise<GeographyNormalizer> {
        this.logger.info(`AliasTableProvider: Loading alias table from ${filePath}`);

        let text: string;
        try {
            text = await fs.readFile(filePath, 'utf8');
        } catch (error) {
            if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
                this.logger.warn(`AliasTableProvider: Alias table not found at ${filePath}. District names will pass through unchanged.`);
                return GeographyNormalizer.empty();
            }
            throw error;
        }

        try {
            const normalizer = GeographyNormalizer.fromDocument(parseYaml(text));
            this.logger.info(`AliasTableProvider: Loaded ${normalizer.ruleCount} alias rules across ${normalizer.states.length} states.`);
            return normalizer;
        } catch (error) {
            if (error instanceof AppError) throw error;
            const message = error instanceof Error ? error.message : String(error);
            throw new ConfigurationError(`Could not parse alias table ${filePath}: ${message}`);
        }
    }
}
