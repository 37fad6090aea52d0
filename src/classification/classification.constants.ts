export const IMAGE_SIZE = 224;
export const TOP_PREDICTIONS = 5;
export const MAX_FILE_SIZE = 10 * 1024 * 1024;
export const ALLOWED_EXTENSIONS: readonly string[] = ['jpg', 'jpeg', 'png', 'bmp', 'gif'];
