import { Column, Entity, Index, JoinColumn, ManyToOne, PrimaryGeneratedColumn } from 'typeorm';
import { PARTITION_TABLES } from '../partition';
import { LongSample, MediumSample, ShortSample } from './sample.entity';

export abstract class SessionRecordColumns {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'integer' })
  @Index()
  sample_id!: number;

  @Column({ type: 'text', nullable: true })
  @Index()
  user_id!: string | null;

  @Column({ type: 'text' })
  @Index()
  callsign!: string; // Position callsign (e.g. "SCEL_TWR")

  @Column({ type: 'real', nullable: true })
  frequency!: number | null;

  @Column({ type: 'text', nullable: true })
  status!: string | null; // Free-text ATIS payload
}

@Entity(PARTITION_TABLES.short.sessions)
export class ShortSessionRecord extends SessionRecordColumns {
  @ManyToOne(() => ShortSample, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'sample_id' })
  sample?: ShortSample;
}

@Entity(PARTITION_TABLES.medium.sessions)
export class MediumSessionRecord extends SessionRecordColumns {
  @ManyToOne(() => MediumSample, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'sample_id' })
  sample?: MediumSample;
}

@Entity(PARTITION_TABLES.long.sessions)
export class LongSessionRecord extends SessionRecordColumns {
  @ManyToOne(() => LongSample, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'sample_id' })
  sample?: LongSample;
}
