import { Checkpoint } from '../entities/Checkpoint';

/**
 * ICheckpointRepository - Load/save boundary for the funding checkpoint
 */
export interface ICheckpointRepository {
  /**
   * @returns The stored checkpoint, or null when none can be loaded
   */
  load(): Promise<Checkpoint | null>;

  /**
   * @throws CheckpointPersistenceException if the write fails
   */
  save(checkpoint: Checkpoint): Promise<void>;
}

export const CHECKPOINT_REPOSITORY = 'ICheckpointRepository';
