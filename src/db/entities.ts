import 'reflect-metadata';
import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';

/**
 * One previous-year exam question.
 *
 * Column types are the ones PostgreSQL and SQLite both accept, so the same
 * entity backs the primary and the secondary database.
 */
@Entity({ name: 'pyqs' })
export class QuestionEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Index()
  @Column({ type: 'text' })
  subject!: string;

  @Index()
  @Column({ name: 'sub_topic', type: 'text', default: '' })
  subTopic!: string;

  @Column({ type: 'text' })
  question!: string;

  // Fractional marks (2.5) occur in real papers
  @Column({ type: 'real', default: 0 })
  marks!: number;

  @Index()
  @Column({ type: 'text', default: '' })
  year!: string;

  @Column({ type: 'text', default: '' })
  semester!: string;

  @Column({ type: 'text', default: '' })
  branch!: string;

  @Column({ type: 'text', default: '' })
  unit!: string;
}

@Entity({ name: 'pdf_history' })
export class UploadRecordEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'text' })
  filename!: string;

  @Column({ type: 'text' })
  subject!: string;

  @Index()
  @CreateDateColumn()
  timestamp!: Date;
}

export const ENTITIES = [QuestionEntity, UploadRecordEntity];
