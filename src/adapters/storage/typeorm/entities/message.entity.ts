import { Entity, PrimaryColumn, Column, Index } from 'typeorm';

/**
 * TypeORM entity for Message
 *
 * Timestamps are stored as fixed-width ISO-8601 strings so that
 * ordering and range filters behave identically on SQLite and PostgreSQL.
 */
@Entity('messages')
@Index('idx_messages_ts_message_id', ['timestamp', 'messageId'])
@Index('idx_messages_from', ['fromAddress'])
export class MessageEntity {
  @PrimaryColumn({ type: 'varchar', name: 'message_id' })
  messageId!: string;

  @Column({ type: 'varchar', name: 'from_msisdn' })
  fromAddress!: string;

  @Column({ type: 'varchar', name: 'to_msisdn' })
  toAddress!: string;

  @Column({ type: 'varchar', length: 32, name: 'ts' })
  timestamp!: string;

  @Column({ type: 'text', nullable: true })
  text!: string | null;

  @Column({ type: 'varchar', length: 32, name: 'created_at' })
  ingestedAt!: string;
}
