import { IsNotEmpty, IsOptional, Max, MaxLength, Min } from 'class-validator';
import {
  Column,
  CreateDateColumn,
  Entity,
  Index,
  PrimaryGeneratedColumn,
  UpdateDateColumn,
} from 'typeorm';

@Entity({ name: 'analysis_result' })
@Index(['created_at', 'prediction_label'])
export class AnalysisResult {
  @PrimaryGeneratedColumn()
  id!: number;

  /** Path of the stored image relative to the media root. */
  @IsNotEmpty()
  @Column({ length: 255 })
  image!: string;

  @IsOptional()
  @MaxLength(255)
  @Column({ type: 'varchar', length: 255, nullable: true })
  original_filename!: string | null;

  @IsNotEmpty()
  @MaxLength(255)
  @Index()
  @Column({ length: 255 })
  prediction_label!: string;

  @Min(0)
  @Max(100)
  @Column('double')
  prediction_score!: number;

  @MaxLength(50)
  @Column({ length: 50, default: 'v1.0' })
  model_version!: string;

  @IsOptional()
  @Min(0)
  @Column({ type: 'double', nullable: true })
  processing_time!: number | null;

  @Index()
  @CreateDateColumn()
  created_at!: Date;

  @UpdateDateColumn()
  updated_at!: Date;
}
