import { Injectable, Logger } from '@nestjs/common';
import { readFile } from 'fs/promises';
import Joi from 'joi';
import { BreachCorpus } from '../engine/corpus';
import {
  BreachRecord,
  RISK_LEVELS,
  RawBreachEntry,
  RiskLevel,
} from '../types/breach.types';

const entrySchema = Joi.object<RawBreachEntry>({
  date: Joi.string().allow('', null),
  risk_level: Joi.string().allow('', null),
  description: Joi.string().allow('', null),
  leaked_details: Joi.array().default([]),
}).unknown(true);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function compareSources(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function isRiskLevel(value: string): value is RiskLevel {
  return RISK_LEVELS.some((level) => level === value);
}

export function normalizeRiskLevel(value: string | null | undefined): RiskLevel {
  const candidate = (value ?? '').trim().toLowerCase();
  return isRiskLevel(candidate) ? candidate : 'unknown';
}

@Injectable()
export class CorpusLoader {
  private readonly logger = new Logger(CorpusLoader.name);

  async load(path: string): Promise<BreachCorpus> {
    let text: string;
    try {
      text = await readFile(path, 'utf8');
    } catch (error) {
      const code = (error as NodeJS.ErrnoException).code;
      if (code === 'ENOENT') {
        this.logger.warn(`Breach corpus ${path} not found, starting empty`);
      } else {
        this.logger.error(
          `Failed to read breach corpus ${path}: ${(error as Error).message}`,
        );
      }
      return BreachCorpus.empty();
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      this.logger.error(
        `Breach corpus ${path} is not valid JSON: ${(error as Error).message}`,
      );
      return BreachCorpus.empty();
    }

    const corpus = this.parse(raw);
    this.logger.log(`Loaded ${corpus.size} breach records from ${path}`);
    return corpus;
  }

  parse(raw: unknown): BreachCorpus {
    if (!isRecord(raw)) {
      this.logger.error('Breach corpus must be an object keyed by source name');
      return BreachCorpus.empty();
    }

    // Object key order puts integer-like names first, so order by name.
    const sources = Object.keys(raw).sort(compareSources);
    const records: BreachRecord[] = [];
    for (const source of sources) {
      const record = this.toRecord(source, raw[source]);
      if (record) records.push(record);
    }
    return BreachCorpus.fromRecords(records);
  }

  private toRecord(source: string, entry: unknown): BreachRecord | null {
    const { value, error } = entrySchema.validate(entry);
    if (error || !value) {
      this.logger.warn(
        `Skipping breach entry ${source}: ${error?.message ?? 'empty entry'}`,
      );
      return null;
    }

    const leakedDetails = value.leaked_details ?? [];
    const leakedIdentifiers = leakedDetails.filter(
      (item): item is string => typeof item === 'string' && item.trim() !== '',
    );
    if (leakedIdentifiers.length !== leakedDetails.length) {
      this.logger.warn(
        `Dropped ${leakedDetails.length - leakedIdentifiers.length} invalid leaked details from ${source}`,
      );
    }

    const riskLevel = normalizeRiskLevel(value.risk_level);
    if (value.risk_level && riskLevel === 'unknown') {
      this.logger.warn(
        `Unrecognized risk level "${value.risk_level}" for ${source}`,
      );
    }

    return {
      source,
      date: value.date ?? null,
      riskLevel,
      description: value.description ?? null,
      leakedIdentifiers,
    };
  }
}
