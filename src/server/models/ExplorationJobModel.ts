import type { Collection, Db } from 'mongodb';
import { StorageError, getErrorMessage } from '../types/errors.js';
import type { JobRecord, JobStatus } from '../types/job.js';
import { logger } from '../utils/logger.js';
import { jobRecordSchema } from '../validation/explorationSchemas.js';
import type { JobRepository } from '../services/pipeline/JobRepository.js';

const COLLECTION_NAME = 'exploration_jobs';

/**
 * Job records in MongoDB, one document per job id. Saving replaces the whole
 * document, checkpoint included.
 */
export class MongoJobRepository implements JobRepository {
  private readonly collection: Collection<JobRecord>;
  private indexesEnsured = false;

  constructor(db: Db) {
    this.collection = db.collection<JobRecord>(COLLECTION_NAME);
  }

  async ensureIndexes(): Promise<void> {
    if (this.indexesEnsured) {
      return;
    }
    await this.collection.createIndex({ jobId: 1 }, { unique: true });
    await this.collection.createIndex({ status: 1, createdAt: 1 });
    this.indexesEnsured = true;
  }

  async save(record: JobRecord): Promise<void> {
    try {
      await this.ensureIndexes();
      await this.collection.replaceOne({ jobId: record.jobId }, record, { upsert: true });
    } catch (error) {
      logger.error({ jobId: record.jobId, error: getErrorMessage(error) }, 'Failed to save exploration job');
      throw new StorageError('saveJob', getErrorMessage(error), { jobId: record.jobId });
    }
  }

  async get(jobId: string): Promise<JobRecord | null> {
    const document = await this.run('getJob', () => this.collection.findOne({ jobId }));
    return document ? this.parse(document) : null;
  }

  async list(status?: JobStatus): Promise<JobRecord[]> {
    const documents = await this.run('listJobs', () =>
      this.collection
        .find(status ? { status } : {})
        .sort({ createdAt: 1 })
        .toArray()
    );
    return documents.map((document) => this.parse(document));
  }

  async close(): Promise<void> {
    // The client is shared and closed by the application on shutdown.
  }

  private parse(document: unknown): JobRecord {
    const parsed = jobRecordSchema.safeParse(document);
    if (!parsed.success) {
      throw new StorageError('parseJob', parsed.error.message);
    }
    return parsed.data;
  }

  private async run<T>(operation: string, query: () => Promise<T>): Promise<T> {
    try {
      return await query();
    } catch (error) {
      logger.error({ operation, error: getErrorMessage(error) }, 'MongoDB query failed');
      throw new StorageError(operation, getErrorMessage(error));
    }
  }
}
