import * as tf from '@tensorflow/tfjs';
import { readFile } from 'fs/promises';
import { dirname, join } from 'path';
import { ModelClass, RankedPrediction } from './classification.types';

export type LoadedModel = tf.LayersModel | tf.GraphModel;

function concatenate(shards: Buffer[]): ArrayBuffer {
  const total = shards.reduce((sum, shard) => sum + shard.length, 0);
  const weightData = new ArrayBuffer(total);
  const view = new Uint8Array(weightData);
  let offset = 0;
  for (const shard of shards) {
    view.set(shard, offset);
    offset += shard.length;
  }
  return weightData;
}

/**
 * Loads a TensorFlow.js `model.json` and its weight shards from the local
 * filesystem. Both layers models (Keras conversions) and graph models are
 * accepted; the `format` field decides which loader is used.
 */
export async function loadModelFromDirectory(dir: string): Promise<LoadedModel> {
  const modelJsonPath = join(dir, 'model.json');
  const modelJson: tf.io.ModelJSON = JSON.parse(await readFile(modelJsonPath, 'utf8'));
  if (!modelJson.modelTopology || !Array.isArray(modelJson.weightsManifest)) {
    throw new Error(`${modelJsonPath} has no modelTopology or weightsManifest`);
  }

  const weightSpecs: tf.io.WeightsManifestEntry[] = [];
  const shards: Buffer[] = [];
  for (const group of modelJson.weightsManifest) {
    weightSpecs.push(...group.weights);
    for (const path of group.paths) {
      shards.push(await readFile(join(dirname(modelJsonPath), path)));
    }
  }

  const artifacts: tf.io.ModelArtifacts = {
    modelTopology: modelJson.modelTopology,
    format: modelJson.format,
    generatedBy: modelJson.generatedBy,
    convertedBy: modelJson.convertedBy,
    signature: modelJson.signature,
    userDefinedMetadata: modelJson.userDefinedMetadata,
    modelInitializer: modelJson.modelInitializer,
    weightSpecs,
    weightData: concatenate(shards),
  };
  const handler: tf.io.IOHandler = { load: async () => artifacts };

  if (modelJson.format === 'graph-model') {
    return tf.loadGraphModel(handler);
  }
  return tf.loadLayersModel(handler);
}

/**
 * Reads a Keras-style class index (`{"0": ["n01440764", "tench"], ...}`) into
 * an array ordered by output position.
 */
export async function readClassIndex(file: string): Promise<ModelClass[]> {
  const raw: unknown = JSON.parse(await readFile(file, 'utf8'));
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new Error(`${file} is not a class index object`);
  }

  const entries = Object.entries(raw).map(([key, value]) => {
    const index = Number(key);
    if (!Number.isInteger(index) || index < 0) {
      throw new Error(`${file}: "${key}" is not an output index`);
    }
    if (
      !Array.isArray(value) ||
      typeof value[0] !== 'string' ||
      typeof value[1] !== 'string'
    ) {
      throw new Error(`${file}: entry ${key} must be [class_id, label]`);
    }
    return { index, class_id: value[0], native_label: value[1] };
  });

  entries.sort((a, b) => a.index - b.index);
  entries.forEach((entry, position) => {
    if (entry.index !== position) {
      throw new Error(`${file}: missing entry for output index ${position}`);
    }
  });

  return entries.map(({ class_id, native_label }) => ({ class_id, native_label }));
}

/**
 * Keeps the `k` most probable classes, highest first. Equal probabilities keep
 * the model's output order.
 */
export function selectTopK(
  probabilities: ArrayLike<number>,
  classes: readonly ModelClass[],
  k: number,
): RankedPrediction[] {
  const order = Array.from({ length: probabilities.length }, (_, i) => i);
  order.sort((a, b) => probabilities[b] - probabilities[a] || a - b);

  return order.slice(0, k).map((i) => ({
    class_id: classes[i].class_id,
    native_label: classes[i].native_label,
    probability: probabilities[i],
  }));
}
