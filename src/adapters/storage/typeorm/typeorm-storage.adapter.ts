import { Logger } from '@nestjs/common';
import {
  DataSource,
  QueryFailedError,
  Repository,
  SelectQueryBuilder,
} from 'typeorm';
import {
  MessageStore,
  InsertAttempt,
  InsertOutcome,
  Message,
  MessageCandidate,
  MessageFilter,
  MessageStats,
  Pagination,
  PaginatedResult,
  summarizeSenders,
  toStoredTimestamp,
} from '../../../core';
import { MessageEntity } from './entities';

/**
 * Driver error codes raised by a primary key conflict
 */
const UNIQUE_VIOLATION_CODES = new Set([
  '23505', // postgres
  'SQLITE_CONSTRAINT_PRIMARYKEY',
  'SQLITE_CONSTRAINT_UNIQUE',
]);

interface SenderAggregateRow {
  sender: string;
  count: string | number;
  earliest: string;
  latest: string;
}

/**
 * TypeORM implementation of MessageStore for SQLite and PostgreSQL
 */
export class TypeORMStorageAdapter implements MessageStore {
  private readonly logger = new Logger(TypeORMStorageAdapter.name);
  private readonly messageRepo: Repository<MessageEntity>;

  constructor(private readonly dataSource: DataSource) {
    this.messageRepo = dataSource.getRepository(MessageEntity);
  }

  /**
   * Message Operations
   */

  async insert(candidate: MessageCandidate): Promise<InsertAttempt> {
    const message = Message.fromCandidate(candidate);
    const entity = this.messageRepo.create({
      messageId: message.messageId,
      fromAddress: message.fromAddress,
      toAddress: message.toAddress,
      timestamp: toStoredTimestamp(message.timestamp),
      text: message.text,
      ingestedAt: toStoredTimestamp(message.ingestedAt),
    });

    try {
      await this.messageRepo.insert(entity);
    } catch (error) {
      if (this.isUniqueViolation(error)) {
        return {
          outcome: InsertOutcome.ALREADY_EXISTS,
          messageId: candidate.messageId,
        };
      }
      throw error;
    }

    return { outcome: InsertOutcome.CREATED, message };
  }

  async list(
    filter: MessageFilter,
    pagination: Pagination,
  ): Promise<PaginatedResult<Message>> {
    const qb = this.messageRepo.createQueryBuilder('m');
    this.applyMessageFilter(qb, filter);

    const total = await qb.getCount();

    qb.orderBy('m.ts', 'ASC')
      .addOrderBy('m.message_id', 'ASC')
      .offset(pagination.offset)
      .limit(pagination.limit);

    const entities = await qb.getMany();

    return {
      items: entities.map((e) => this.mapMessageEntityToDomain(e)),
      total,
      limit: pagination.limit,
      offset: pagination.offset,
    };
  }

  /**
   * One grouped statement, so every figure comes from the same snapshot
   */
  async stats(): Promise<MessageStats> {
    const rows = await this.messageRepo
      .createQueryBuilder('m')
      .select('m.from_msisdn', 'sender')
      .addSelect('COUNT(*)', 'count')
      .addSelect('MIN(m.ts)', 'earliest')
      .addSelect('MAX(m.ts)', 'latest')
      .groupBy('m.from_msisdn')
      .getRawMany<SenderAggregateRow>();

    return summarizeSenders(
      rows.map((row) => ({
        sender: row.sender,
        count: Number(row.count),
        earliest: new Date(row.earliest),
        latest: new Date(row.latest),
      })),
    );
  }

  async findByMessageId(messageId: string): Promise<Message | null> {
    const entity = await this.messageRepo.findOne({ where: { messageId } });
    return entity ? this.mapMessageEntityToDomain(entity) : null;
  }

  /**
   * Health Check
   */

  async isHealthy(): Promise<boolean> {
    if (!this.dataSource.isInitialized) {
      return false;
    }

    try {
      await this.dataSource.query('SELECT 1');
      return true;
    } catch (error) {
      this.logger.warn(
        `Health check query failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      return false;
    }
  }

  async close(): Promise<void> {
    if (this.dataSource.isInitialized) {
      await this.dataSource.destroy();
    }
  }

  /**
   * Helper Methods
   */

  private applyMessageFilter(
    qb: SelectQueryBuilder<MessageEntity>,
    filter: MessageFilter,
  ): void {
    if (filter.from) {
      qb.andWhere('m.from_msisdn = :from', { from: filter.from });
    }
    if (filter.since) {
      qb.andWhere('m.ts >= :since', { since: toStoredTimestamp(filter.since) });
    }
    if (filter.q) {
      qb.andWhere("LOWER(m.text) LIKE :q ESCAPE '\\'", {
        q: `%${this.escapeLike(filter.q.toLowerCase())}%`,
      });
    }
  }

  private escapeLike(value: string): string {
    return value.replace(/[\\%_]/g, (char) => `\\${char}`);
  }

  private isUniqueViolation(error: unknown): boolean {
    if (!(error instanceof QueryFailedError)) {
      return false;
    }

    const driverError: unknown = error.driverError;
    if (
      typeof driverError !== 'object' ||
      driverError === null ||
      !('code' in driverError)
    ) {
      return false;
    }

    return UNIQUE_VIOLATION_CODES.has(String(driverError.code));
  }

  /**
   * Entity to Domain Mappers
   */

  private mapMessageEntityToDomain(entity: MessageEntity): Message {
    return new Message(
      entity.messageId,
      entity.fromAddress,
      entity.toAddress,
      new Date(entity.timestamp),
      entity.text,
      new Date(entity.ingestedAt),
    );
  }
}
