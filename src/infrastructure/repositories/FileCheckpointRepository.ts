import { Injectable, Logger } from '@nestjs/common';
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { Checkpoint } from '../../domain/entities/Checkpoint';
import { ICheckpointRepository } from '../../domain/ports/ICheckpointRepository';
import { CheckpointPersistenceException } from '../../domain/exceptions/DomainException';
import { RebalancerConfig } from '../../domain/value-objects/RebalancerConfig';

const isoDate = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), 'must be an ISO-8601 date');

/**
 * On-disk checkpoint document
 */
export const checkpointDocumentSchema = z.object({
  lastFundingDate: isoDate.nullish(),
  referenceEquities: z.record(z.number()),
  idealAllocations: z.record(z.number()),
  targetInvestmentEquityRatio: z.number().min(0).max(1),
  finishDate: isoDate,
});

export type CheckpointDocument = z.infer<typeof checkpointDocumentSchema>;

export function toCheckpointDocument(checkpoint: Checkpoint): CheckpointDocument {
  return {
    lastFundingDate: checkpoint.lastFundingDate?.toISOString() ?? null,
    referenceEquities: { ...checkpoint.referenceEquities },
    idealAllocations: { ...checkpoint.idealAllocations },
    targetInvestmentEquityRatio: checkpoint.targetInvestmentEquityRatio,
    finishDate: checkpoint.finishDate.toISOString(),
  };
}

export function fromCheckpointDocument(document: CheckpointDocument): Checkpoint {
  return new Checkpoint(
    document.lastFundingDate ? new Date(document.lastFundingDate) : null,
    document.referenceEquities,
    document.idealAllocations,
    document.targetInvestmentEquityRatio,
    new Date(document.finishDate),
  );
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * FileCheckpointRepository - Keeps the funding checkpoint in a JSON file
 *
 * A missing or invalid document loads as null,
 * which makes the service sample a fresh checkpoint from the live portfolio.
 */
@Injectable()
export class FileCheckpointRepository implements ICheckpointRepository {
  private readonly logger = new Logger(FileCheckpointRepository.name);
  private readonly dataFilePath: string;

  constructor(config: RebalancerConfig) {
    this.dataFilePath = path.resolve(process.cwd(), config.stateFilePath);
  }

  get filePath(): string {
    return this.dataFilePath;
  }

  async load(): Promise<Checkpoint | null> {
    if (!fs.existsSync(this.dataFilePath)) {
      this.logger.log(`No checkpoint file at ${this.dataFilePath}, starting fresh`);
      return null;
    }

    try {
      const raw: unknown = JSON.parse(fs.readFileSync(this.dataFilePath, 'utf-8'));
      const parsed = checkpointDocumentSchema.safeParse(raw);

      if (!parsed.success) {
        const issues = parsed.error.issues
          .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
          .join('; ');
        this.logger.warn(`Ignoring invalid checkpoint file ${this.dataFilePath}: ${issues}`);
        return null;
      }

      const checkpoint = fromCheckpointDocument(parsed.data);
      this.logger.log(
        `Loaded checkpoint: ${Object.keys(checkpoint.idealAllocations).length} assets, ` +
          `last funded ${checkpoint.lastFundingDate?.toISOString() ?? 'never'}`,
      );
      return checkpoint;
    } catch (error: unknown) {
      this.logger.warn(
        `Failed to load checkpoint file ${this.dataFilePath}: ${messageOf(error)}`,
      );
      return null;
    }
  }

  /**
   * Write to a temp file, then rename over the previous document
   */
  async save(checkpoint: Checkpoint): Promise<void> {
    const tempPath = `${this.dataFilePath}.tmp`;

    try {
      const dir = path.dirname(this.dataFilePath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }

      fs.writeFileSync(
        tempPath,
        JSON.stringify(toCheckpointDocument(checkpoint), null, 2),
        'utf-8',
      );
      fs.renameSync(tempPath, this.dataFilePath);
    } catch (error: unknown) {
      this.logger.error(`Failed to persist checkpoint: ${messageOf(error)}`);
      throw new CheckpointPersistenceException(messageOf(error), this.dataFilePath);
    }

    this.logger.debug(`Saved checkpoint to ${this.dataFilePath}`);
  }
}
