import { join } from 'path';

export type PreprocessingMode = 'raw' | 'tf' | 'torch' | 'caffe';

const PREPROCESSING_MODES: readonly PreprocessingMode[] = ['raw', 'tf', 'torch', 'caffe'];

export type AppConfig = {
  port: number;
  clusterWorkers: number;
  media: {
    root: string;
    url: string;
  };
  model: {
    dir: string;
    classIndexFile: string;
    name: string;
    version: string;
    preprocessing: PreprocessingMode;
  };
  labels: {
    file: string;
  };
};

function toInt(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function toPreprocessingMode(value: string | undefined): PreprocessingMode {
  const mode = PREPROCESSING_MODES.find((candidate) => candidate === value);
  if (value !== undefined && mode === undefined) {
    throw new Error(
      `Invalid MODEL_PREPROCESSING: ${value} (expected one of ${PREPROCESSING_MODES.join(', ')})`,
    );
  }
  return mode ?? 'raw';
}

// MEDIA_URL always ends with a slash so stored paths can be appended to it.
function toMediaUrl(value: string | undefined): string {
  const url = value || '/media/';
  return url.endsWith('/') ? url : `${url}/`;
}

export default function appConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const modelDir = env.MODEL_DIR || join(process.cwd(), 'models', 'efficientnet-b0');

  return {
    port: toInt(env.PORT, 8000),
    clusterWorkers: toInt(env.CLUSTER_WORKERS, 1),
    media: {
      root: env.MEDIA_ROOT || join(process.cwd(), 'media'),
      url: toMediaUrl(env.MEDIA_URL),
    },
    model: {
      dir: modelDir,
      classIndexFile: env.MODEL_CLASS_INDEX || join(modelDir, 'class_index.json'),
      name: env.MODEL_NAME || 'EfficientNetB0',
      version: env.MODEL_VERSION || 'v1.0',
      preprocessing: toPreprocessingMode(env.MODEL_PREPROCESSING || undefined),
    },
    labels: {
      file: env.LABELS_FILE || join(process.cwd(), 'data', 'imagenet_class_index_ja.json'),
    },
  };
}

/** Tag stored with every result, e.g. `EfficientNetB0-v1.0`. */
export function modelVersionTag(model: Pick<AppConfig['model'], 'name' | 'version'>): string {
  return `${model.name}-${model.version}`;
}
