/** Raw bytes of one uploaded file, read fully from the multipart stream. */
export interface UploadedImage {
  filename: string;
  mimetype?: string;
  buffer: Buffer;
}

/** NHWC float tensor with a batch dimension of one. */
export interface ImageTensor {
  data: Float32Array;
  shape: [1, number, number, 3];
}

export interface ModelClass {
  class_id: string;
  native_label: string;
}

export interface RankedPrediction extends ModelClass {
  probability: number;
}

export interface FormattedPrediction {
  name: string;
  prob: string;
  raw_prob: number;
  class_id: string;
}

export type ValidationFailure = { kind: 'validation'; message: string };
export type DecodeFailure = { kind: 'decode'; message: string };
export type InferenceFailure = { kind: 'inference'; message: string };

export type PreprocessFailure = ValidationFailure | DecodeFailure;
export type AnalysisFailure = PreprocessFailure | InferenceFailure;

export interface ModelInfo {
  name: string;
  version: string;
  is_loaded: boolean;
  input_shape: (number | null)[] | null;
  output_shape: (number | null)[] | null;
  classes: number;
}

export class ModelNotLoadedError extends Error {
  constructor(message = 'Classification model is not loaded') {
    super(message);
    this.name = 'ModelNotLoadedError';
  }
}
