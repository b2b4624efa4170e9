import { Column, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';
import { PARTITION_TABLES } from '../partition';

/**
 * One point-in-time capture of the network. The same capture is written to
 * every partition; ids are partition-local and only ever increase.
 */
export abstract class SampleColumns {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'integer' })
  @Index()
  timestamp!: number; // Unix timestamp (ms), UTC
}

@Entity(PARTITION_TABLES.short.samples)
export class ShortSample extends SampleColumns {}

@Entity(PARTITION_TABLES.medium.samples)
export class MediumSample extends SampleColumns {}

@Entity(PARTITION_TABLES.long.samples)
export class LongSample extends SampleColumns {}
