import { existsSync } from 'fs';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { testConfig } from '../../test/test-config';
import { BlobStorageService, sanitizeFilename } from './blob-storage.service';

describe('sanitizeFilename', () => {
  it.each([
    ['My Dog (1).JPG', ['My_Dog_1', '.jpg']],
    ['C:\\photos\\cat.png', ['cat', '.png']],
    ['日本語.gif', ['image', '.gif']],
    ['../../etc/passwd', ['passwd', '']],
  ])('should reduce %s to %p', (filename, expected) => {
    expect(sanitizeFilename(filename)).toEqual(expected);
  });
});

describe('BlobStorageService', () => {
  let mediaRoot: string;
  let storage: BlobStorageService;

  beforeEach(async () => {
    mediaRoot = await mkdtemp(join(tmpdir(), 'blob-storage-spec-'));
    storage = new BlobStorageService(testConfig({ media: { root: mediaRoot, url: '/media/' } }));
  });

  afterEach(async () => {
    await rm(mediaRoot, { recursive: true, force: true });
  });

  it('should store the content under a dated directory with a unique suffix', async () => {
    const content = Buffer.from('pixels');

    const path = await storage.save('cat.png', content, new Date(2024, 0, 5));

    expect(path).toMatch(/^uploads\/2024\/01\/05\/cat_[0-9a-f]{8}\.png$/);
    await expect(readFile(join(mediaRoot, path))).resolves.toEqual(content);
  });

  it('should never reuse a path for the same upload name', async () => {
    const now = new Date(2024, 0, 5);

    const first = await storage.save('cat.png', Buffer.from('a'), now);
    const second = await storage.save('cat.png', Buffer.from('b'), now);

    expect(second).not.toBe(first);
  });

  it('should build the public URL under the media prefix', () => {
    expect(storage.url('uploads/2024/01/05/cat_0a1b2c3d.png')).toBe(
      '/media/uploads/2024/01/05/cat_0a1b2c3d.png',
    );
  });

  it('should remove a stored blob', async () => {
    const path = await storage.save('dog.jpg', Buffer.from('x'));

    await storage.remove(path);

    expect(existsSync(join(mediaRoot, path))).toBe(false);
  });

  it('should treat a blob that is already gone as removed', async () => {
    await expect(storage.remove('uploads/2024/01/05/gone.png')).resolves.toBeUndefined();
  });

  it('should refuse paths outside the media root', () => {
    expect(() => storage.resolve('../outside.png')).toThrow(
      'Refusing to access ../outside.png outside the media root',
    );
  });
});
