/**
 * Filesystem Rename Sink
 *
 * RenameSink adapter that writes each decided unit into the output directory
 * under its final name. Existing files are never overwritten: a collision
 * gets "_2", "_3", ... before the extension.
 *
 * With a runId, every write is recorded in "{runId}_emitted.json" (document
 * id -> output name). A retried run finds its earlier outputs there and
 * returns them instead of writing "_2" copies.
 */

import { access, mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { buildFinalName } from '../classification/naming.js';
import type { FinalizableUnit, FinalizeOutcome, RenameSink } from './types.js';

const MAX_COLLISION_SUFFIX = 99;

const EmissionLedgerSchema = z.record(z.string(), z.string());

export interface FsRenameSinkOptions {
  /** Enables the per-run emission ledger */
  runId?: string;
}

export function emissionLedgerName(runId: string): string {
  return `${runId}_emitted.json`;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch (err) {
    if (isNotFound(err)) return false;
    throw err;
  }
}

function isAlreadyExists(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'EEXIST';
}

export function withCollisionSuffix(name: string, attempt: number): string {
  if (attempt <= 1) return name;
  const dot = name.lastIndexOf('.');
  return dot > 0 ? `${name.slice(0, dot)}_${attempt}${name.slice(dot)}` : `${name}_${attempt}`;
}

export class FsRenameSink implements RenameSink {
  private ledger: Map<string, string> | null = null;

  constructor(
    private readonly outputDir: string,
    private readonly options: FsRenameSinkOptions = {},
  ) {}

  private ledgerPath(runId: string): string {
    return join(this.outputDir, emissionLedgerName(runId));
  }

  private async loadLedger(runId: string): Promise<Map<string, string>> {
    if (this.ledger) return this.ledger;

    let raw: string;
    try {
      raw = await readFile(this.ledgerPath(runId), 'utf-8');
    } catch (err) {
      if (!isNotFound(err)) throw err;
      this.ledger = new Map();
      return this.ledger;
    }

    const parsed = EmissionLedgerSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(`Invalid emission ledger ${emissionLedgerName(runId)}`);
    }
    this.ledger = new Map(Object.entries(parsed.data));
    return this.ledger;
  }

  private async record(runId: string, documentId: string, outputName: string): Promise<void> {
    const ledger = await this.loadLedger(runId);
    ledger.set(documentId, outputName);
    await writeFile(this.ledgerPath(runId), JSON.stringify(Object.fromEntries(ledger), null, 2), 'utf-8');
  }

  /** Output name from an earlier attempt of this run, if that file is still there */
  private async previousOutput(runId: string, documentId: string): Promise<string | null> {
    const outputName = (await this.loadLedger(runId)).get(documentId);
    if (outputName === undefined) return null;
    return (await fileExists(join(this.outputDir, outputName))) ? outputName : null;
  }

  async finalize(
    unit: FinalizableUnit,
    finalCode: string,
    qualifierText: string,
    period: string,
  ): Promise<FinalizeOutcome> {
    const ext = unit.document.kind === 'csv' ? '.csv' : '.pdf';
    const baseName = buildFinalName(finalCode, qualifierText, period, ext);

    const { runId } = this.options;

    try {
      await mkdir(this.outputDir, { recursive: true });

      if (runId) {
        const previous = await this.previousOutput(runId, unit.document.id);
        if (previous) {
          console.log('[rename-sink] Already emitted in an earlier attempt:', { runId, outputName: previous });
          return { ok: true, outputName: previous };
        }
      }

      for (let attempt = 1; attempt <= MAX_COLLISION_SUFFIX; attempt++) {
        const outputName = withCollisionSuffix(baseName, attempt);
        try {
          await writeFile(join(this.outputDir, outputName), unit.document.bytes, { flag: 'wx' });
          if (runId) await this.record(runId, unit.document.id, outputName);
          return { ok: true, outputName };
        } catch (err) {
          if (!isAlreadyExists(err)) throw err;
        }
      }
      return { ok: false, error: `Too many files named ${baseName} in ${this.outputDir}` };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error('[rename-sink] Write failed:', { sourceFile: unit.sourceFile, ordinal: unit.ordinal, error: message });
      return { ok: false, error: message };
    }
  }
}
