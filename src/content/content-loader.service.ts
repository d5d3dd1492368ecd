// taleweave_v1 JSON load + validation + in-memory cache

import { Injectable, Logger, type OnModuleInit } from '@nestjs/common';
import { readFile } from 'fs/promises';
import { join } from 'path';
import type { ZodType, ZodTypeDef } from 'zod';
import { InternalError } from '../common/errors/game-errors.js';
import {
  ArchetypeTableSchema,
  EngineConfigSchema,
  EquivalenceTableSchema,
  ExtractionRulesSchema,
  type ArchetypeTable,
  type EngineConfig,
  type EquivalenceTable,
  type ExtractionRules,
  type LoadedContent,
} from './content.types.js';

export const DEFAULT_CONTENT_DIR = join(process.cwd(), 'content', 'taleweave_v1');

@Injectable()
export class ContentLoaderService implements OnModuleInit {
  private readonly logger = new Logger(ContentLoaderService.name);
  private content: LoadedContent | null = null;

  async onModuleInit(): Promise<void> {
    await this.loadAll(process.env.CONTENT_DIR ?? DEFAULT_CONTENT_DIR);
  }

  async loadAll(dir: string = DEFAULT_CONTENT_DIR): Promise<LoadedContent> {
    const [engine, extraction, archetypes, equivalences] = await Promise.all([
      this.readJson(dir, 'engine-config.json', EngineConfigSchema),
      this.readJson(dir, 'extraction-rules.json', ExtractionRulesSchema),
      this.readJson(dir, 'archetypes.json', ArchetypeTableSchema),
      this.readJson(dir, 'equivalences.json', EquivalenceTableSchema),
    ]);

    // compile once at load so a bad regex fails startup
    for (const fieldRules of extraction.fields) {
      for (const rule of fieldRules.rules) {
        if (rule.kind !== 'pattern') continue;
        for (const p of rule.patterns) {
          try {
            new RegExp(p.regex, 'i');
          } catch (err) {
            throw new InternalError(`Invalid regex in rule ${rule.id}`, {
              regex: p.regex,
              error: String(err),
            });
          }
        }
      }
    }

    this.content = { engine, extraction, archetypes, equivalences };
    this.logger.log(
      `Content loaded from ${dir}: engine=${engine.version}, rules=${extraction.fields.length} fields, archetype rules=${archetypes.rules.length}`,
    );
    return this.content;
  }

  getEngineConfig(): EngineConfig {
    return this.require().engine;
  }

  getExtractionRules(): ExtractionRules {
    return this.require().extraction;
  }

  getArchetypeTable(): ArchetypeTable {
    return this.require().archetypes;
  }

  getEquivalences(): EquivalenceTable {
    return this.require().equivalences;
  }

  private require(): LoadedContent {
    if (!this.content) {
      throw new InternalError('Content accessed before it was loaded');
    }
    return this.content;
  }

  private async readJson<T>(
    dir: string,
    file: string,
    schema: ZodType<T, ZodTypeDef, unknown>,
  ): Promise<T> {
    const raw = await readFile(join(dir, file), 'utf-8');
    const parsed = schema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      const issues = parsed.error.issues.map(
        (i) => `${i.path.join('.')}: ${i.message}`,
      );
      throw new InternalError(`Invalid content file ${file}`, { issues });
    }
    return parsed.data;
  }
}
