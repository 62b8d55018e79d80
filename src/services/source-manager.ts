/**
 * Source Manager
 * Registration and lifecycle of monitored sources. Sources are never deleted
 * while records reference them; deactivation stops future scheduling only.
 */

import { readFile } from 'fs/promises';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { INGESTION_DEFAULTS } from '../config/constants.js';
import type { ContentStore, SourceListFilter } from '../db/content-store.js';
import type {
  CreateSourceInput,
  MonitoredSource,
  SourceTypeHint,
  UpdateSourceInput,
} from '../types/index.js';
import { NotFoundError, ValidationError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import { canonicalizeUrl, isHttpUrl } from '../utils/url.js';

const log = createLogger('sources');

export const DEFAULT_REGISTRY_PATH = join(
  dirname(fileURLToPath(import.meta.url)),
  '..',
  '..',
  'config',
  'sources.json'
);

export const SOURCE_TYPE_HINTS = ['page', 'blog_index', 'blog_post', 'feed'] as const satisfies readonly SourceTypeHint[];

const registrySchema = z.object({
  sources: z.array(
    z.object({
      url: z.string().url(),
      typeHint: z.enum(SOURCE_TYPE_HINTS).default('page'),
      tags: z.array(z.string().min(1)).default([]),
      checkFrequencyHours: z.number().int().positive().optional(),
      isActive: z.boolean().default(true),
    })
  ),
});

export interface SeedResult {
  seeded: number;
  sources: MonitoredSource[];
}

export class SourceManager {
  constructor(
    private readonly store: ContentStore,
    private readonly defaultFrequencyHours: number = INGESTION_DEFAULTS.checkFrequencyHours
  ) {}

  async addSource(input: CreateSourceInput): Promise<MonitoredSource> {
    if (!isHttpUrl(input.url)) {
      throw new ValidationError(`Not an http(s) URL: ${input.url}`);
    }
    const source = await this.store.upsertSource({
      ...input,
      url: canonicalizeUrl(input.url),
      tags: normalizeTags(input.tags ?? []),
      checkFrequencyHours: input.checkFrequencyHours ?? this.defaultFrequencyHours,
    });
    log.info({ url: source.url, typeHint: source.typeHint, addedBy: source.addedBy }, 'Source registered');
    return source;
  }

  async getSource(url: string): Promise<MonitoredSource> {
    const source = await this.store.getSource(canonicalizeUrl(url));
    if (!source) throw new NotFoundError(`Source not found: ${url}`);
    return source;
  }

  async updateSource(url: string, input: UpdateSourceInput): Promise<MonitoredSource> {
    if (input.checkFrequencyHours !== undefined && !(input.checkFrequencyHours > 0)) {
      throw new ValidationError('checkFrequencyHours must be positive');
    }
    const updated = await this.store.updateSource(canonicalizeUrl(url), {
      ...input,
      tags: input.tags ? normalizeTags(input.tags) : undefined,
    });
    if (!updated) throw new NotFoundError(`Source not found: ${url}`);
    return updated;
  }

  async deactivateSource(url: string): Promise<MonitoredSource> {
    const source = await this.updateSource(url, { isActive: false });
    log.info({ url: source.url }, 'Source deactivated');
    return source;
  }

  async listSources(filter: SourceListFilter = {}): Promise<MonitoredSource[]> {
    return this.store.listSources(filter);
  }

  /**
   * Register every source in the JSON registry (idempotent).
   */
  async seedSources(path: string = DEFAULT_REGISTRY_PATH): Promise<SeedResult> {
    const raw: unknown = JSON.parse(await readFile(path, 'utf-8'));
    const parsed = registrySchema.safeParse(raw);
    if (!parsed.success) {
      throw new ValidationError(`Invalid source registry ${path}: ${parsed.error.message}`);
    }

    const sources: MonitoredSource[] = [];
    for (const entry of parsed.data.sources) {
      sources.push(await this.addSource({ ...entry, addedBy: 'registry' }));
    }

    log.info({ path, seeded: sources.length }, 'Seeded sources');
    return { seeded: sources.length, sources };
  }
}

function normalizeTags(tags: string[]): string[] {
  return [...new Set(tags.map(tag => tag.trim().toLowerCase()).filter(Boolean))].sort();
}
