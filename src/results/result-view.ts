import { basename } from 'path';
import { AnalysisResult } from './entities/analysis-result.entity';

export type ConfidenceLevel = 'very_high' | 'high' | 'medium' | 'low';

const RECENT_HOURS = 24;

export interface ResultView {
  id: number;
  image_url: string;
  image_filename: string;
  original_filename: string | null;
  prediction_label: string;
  prediction_score: number;
  formatted_score: string;
  confidence_level: ConfidenceLevel;
  model_version: string;
  processing_time: number | null;
  created_at: Date;
  updated_at: Date;
  is_recent: boolean;
}

export function confidenceLevel(score: number): ConfidenceLevel {
  if (score >= 90) return 'very_high';
  if (score >= 70) return 'high';
  if (score >= 50) return 'medium';
  return 'low';
}

export function toResultView(
  result: AnalysisResult,
  imageUrl: string,
  now: Date = new Date(),
): ResultView {
  return {
    id: result.id,
    image_url: imageUrl,
    image_filename: basename(result.image),
    original_filename: result.original_filename,
    prediction_label: result.prediction_label,
    prediction_score: result.prediction_score,
    formatted_score: `${result.prediction_score.toFixed(2)}%`,
    confidence_level: confidenceLevel(result.prediction_score),
    model_version: result.model_version,
    processing_time: result.processing_time,
    created_at: result.created_at,
    updated_at: result.updated_at,
    is_recent: now.getTime() - result.created_at.getTime() < RECENT_HOURS * 3600 * 1000,
  };
}
