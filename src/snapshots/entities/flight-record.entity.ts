import { Column, Entity, Index, JoinColumn, ManyToOne, PrimaryGeneratedColumn } from 'typeorm';
import { PARTITION_TABLES } from '../partition';
import { LongSample, MediumSample, ShortSample } from './sample.entity';

export abstract class FlightRecordColumns {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'integer' })
  @Index()
  sample_id!: number;

  @Column({ type: 'text', nullable: true })
  @Index()
  user_id!: string | null; // Network member id, callsign is used when missing

  @Column({ type: 'text' })
  @Index()
  callsign!: string;

  @Column({ type: 'text', default: '' })
  departure!: string; // ICAO code

  @Column({ type: 'text', default: '' })
  arrival!: string; // ICAO code

  @Column({ type: 'text', default: '' })
  route!: string;

  @Column({ type: 'integer', default: 0 })
  seats!: number; // People on board as filed

  @Column({ type: 'text', default: '' })
  aircraft!: string; // Aircraft type code
}

@Entity(PARTITION_TABLES.short.flights)
export class ShortFlightRecord extends FlightRecordColumns {
  @ManyToOne(() => ShortSample, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'sample_id' })
  sample?: ShortSample;
}

@Entity(PARTITION_TABLES.medium.flights)
export class MediumFlightRecord extends FlightRecordColumns {
  @ManyToOne(() => MediumSample, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'sample_id' })
  sample?: MediumSample;
}

@Entity(PARTITION_TABLES.long.flights)
export class LongFlightRecord extends FlightRecordColumns {
  @ManyToOne(() => LongSample, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'sample_id' })
  sample?: LongSample;
}
