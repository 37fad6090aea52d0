import { PreprocessingMode } from '../config/app.config';

const TORCH_MEAN = [0.485, 0.456, 0.406];
const TORCH_STD = [0.229, 0.224, 0.225];
// BGR order
const CAFFE_MEAN = [103.939, 116.779, 123.68];

/**
 * Converts interleaved 8-bit RGB pixels into the float layout a model family
 * was trained on. The modes mirror the Keras `preprocess_input` variants:
 *
 * - `raw`: values kept in [0, 255] (EfficientNet rescales internally)
 * - `tf`: scaled to [-1, 1]
 * - `torch`: scaled to [0, 1], then standardised with ImageNet mean/std
 * - `caffe`: reordered to BGR, then centred on the ImageNet BGR mean
 */
export function normalizePixels(rgb: Uint8Array, mode: PreprocessingMode): Float32Array {
  const out = new Float32Array(rgb.length);

  for (let i = 0; i < rgb.length; i += 3) {
    const r = rgb[i];
    const g = rgb[i + 1];
    const b = rgb[i + 2];

    switch (mode) {
      case 'raw':
        out[i] = r;
        out[i + 1] = g;
        out[i + 2] = b;
        break;
      case 'tf':
        out[i] = r / 127.5 - 1;
        out[i + 1] = g / 127.5 - 1;
        out[i + 2] = b / 127.5 - 1;
        break;
      case 'torch':
        out[i] = (r / 255 - TORCH_MEAN[0]) / TORCH_STD[0];
        out[i + 1] = (g / 255 - TORCH_MEAN[1]) / TORCH_STD[1];
        out[i + 2] = (b / 255 - TORCH_MEAN[2]) / TORCH_STD[2];
        break;
      case 'caffe':
        out[i] = b - CAFFE_MEAN[0];
        out[i + 1] = g - CAFFE_MEAN[1];
        out[i + 2] = r - CAFFE_MEAN[2];
        break;
    }
  }

  return out;
}
