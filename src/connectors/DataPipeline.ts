/**
 * Data pipelines deliver raw candle records to strategies and the coordinator
 */

import { readFile } from 'fs/promises';
import { CandleRecord } from '../models/Candle';

/**
 * Persisted description of a pipeline, kept with the bot it feeds
 */
export interface DataPipelineSnapshot {
  kind: 'file';
  path: string;
}

export interface DataPipeline {
  run(): Promise<CandleRecord[]>;
  /** Absent for pipelines that cannot be rebuilt from disk */
  toSnapshot?(): DataPipelineSnapshot;
}

export class StaticDataPipeline implements DataPipeline {
  private readonly records: readonly CandleRecord[];

  constructor(records: readonly CandleRecord[]) {
    this.records = records;
  }

  async run(): Promise<CandleRecord[]> {
    return this.records.map(record => ({ ...record }));
  }
}

/**
 * Reads a JSON array of candle records from disk
 */
export class FileDataPipeline implements DataPipeline {
  constructor(private readonly filePath: string) {}

  async run(): Promise<CandleRecord[]> {
    const content = await readFile(this.filePath, 'utf8');
    const parsed: unknown = JSON.parse(content);

    if (!Array.isArray(parsed)) {
      throw new Error(`Candle file ${this.filePath} must contain a JSON array`);
    }

    return parsed.map((entry: unknown, index: number) => {
      if (typeof entry !== 'object' || entry === null || Array.isArray(entry)) {
        throw new Error(`Entry ${index} of ${this.filePath} is not an object`);
      }
      return Object.fromEntries(Object.entries(entry));
    });
  }

  toSnapshot(): DataPipelineSnapshot {
    return { kind: 'file', path: this.filePath };
  }
}

export function restoreDataPipeline(snapshot: DataPipelineSnapshot): DataPipeline {
  return new FileDataPipeline(snapshot.path);
}
