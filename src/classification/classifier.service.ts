import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as tf from '@tensorflow/tfjs';
import { fail, ok, Result } from '../common/result';
import { AppConfig, modelVersionTag } from '../config/app.config';
import { IMAGE_SIZE, TOP_PREDICTIONS } from './classification.constants';
import {
  ImageTensor,
  InferenceFailure,
  ModelClass,
  ModelInfo,
  ModelNotLoadedError,
  RankedPrediction,
} from './classification.types';
import { LoadedModel, loadModelFromDirectory, readClassIndex, selectTopK } from './model-loader';

const INFERENCE_FAILED: InferenceFailure = {
  kind: 'inference',
  message: 'Image analysis failed. Please try again.',
};

/**
 * Holds the process-wide classification model. The model is loaded during
 * module initialisation, which Nest completes before the HTTP server starts
 * listening, and is only read afterwards.
 */
@Injectable()
export class ClassifierService implements OnModuleInit {
  private readonly logger = new Logger(ClassifierService.name);
  private model: LoadedModel | null = null;
  private classes: readonly ModelClass[] = [];
  private loading: Promise<void> | null = null;

  constructor(private readonly configService: ConfigService<AppConfig, true>) {}

  async onModuleInit(): Promise<void> {
    await this.load();
  }

  load(): Promise<void> {
    if (!this.loading) {
      this.loading = this.loadModel().catch((error: unknown) => {
        this.loading = null;
        throw error;
      });
    }
    return this.loading;
  }

  isLoaded(): boolean {
    return this.model !== null;
  }

  get modelVersion(): string {
    return modelVersionTag(this.configService.get('model', { infer: true }));
  }

  getModelInfo(): ModelInfo {
    const { name, version } = this.configService.get('model', { infer: true });
    const input = this.model?.inputs[0];
    const output = this.model?.outputs[0];
    return {
      name,
      version,
      is_loaded: this.model !== null,
      input_shape: input?.shape ?? null,
      output_shape: output?.shape ?? null,
      classes: this.classes.length,
    };
  }

  async infer(tensor: ImageTensor): Promise<Result<RankedPrediction[], InferenceFailure>> {
    const model = this.model;
    if (!model) {
      this.logger.error('Inference requested before the model was loaded');
      throw new ModelNotLoadedError();
    }

    try {
      const probabilities = await this.forward(model, tensor);
      if (probabilities.length !== this.classes.length) {
        throw new Error(
          `model produced ${probabilities.length} scores for ${this.classes.length} classes`,
        );
      }
      return ok(selectTopK(probabilities, this.classes, TOP_PREDICTIONS));
    } catch (error) {
      this.logger.error(
        `Inference failed: ${error instanceof Error ? error.message : String(error)}`,
      );
      return fail(INFERENCE_FAILED);
    }
  }

  private async loadModel(): Promise<void> {
    const { dir, classIndexFile, name, version } = this.configService.get('model', {
      infer: true,
    });
    this.logger.log(`Loading ${name} (${version}) from ${dir}`);

    try {
      await tf.setBackend('cpu');
      await tf.ready();

      const model = await loadModelFromDirectory(dir);
      const classes = await readClassIndex(classIndexFile);

      // Warm-up pass; also checks the output width against the class index.
      const scores = await this.forward(model, {
        data: new Float32Array(IMAGE_SIZE * IMAGE_SIZE * 3),
        shape: [1, IMAGE_SIZE, IMAGE_SIZE, 3],
      });
      if (scores.length !== classes.length) {
        throw new Error(
          `model has ${scores.length} outputs but ${classIndexFile} lists ${classes.length} classes`,
        );
      }

      this.classes = classes;
      this.model = model;
      this.logger.log(`${name} loaded with ${classes.length} classes`);
    } catch (error) {
      this.logger.error(
        `Could not load ${name}: ${error instanceof Error ? error.message : String(error)}`,
      );
      throw error;
    }
  }

  private async forward(model: LoadedModel, tensor: ImageTensor): Promise<Float32Array> {
    const input = tf.tensor4d(tensor.data, tensor.shape);
    try {
      const output = model.predict(input);
      if (!(output instanceof tf.Tensor)) {
        throw new Error('expected a single output tensor');
      }
      try {
        return Float32Array.from(await output.data());
      } finally {
        output.dispose();
      }
    } finally {
      input.dispose();
    }
  }
}
