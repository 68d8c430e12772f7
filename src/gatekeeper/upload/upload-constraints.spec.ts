import { join } from 'path';
import { GatekeeperConfigError } from '../errors';
import {
  DEFAULT_SNIFF_BYTES,
  defaultUploadConstraints,
  defineUploadConstraints,
  documentUploadConstraints,
  imageUploadConstraints,
  multipleImageUploadConstraints,
} from './upload-constraints';

const ROOT = '/srv/uploads';

describe('upload constraints', () => {
  it('should describe the default preset', () => {
    const preset = defaultUploadConstraints(ROOT);

    expect(preset.maxSizeBytes).toBe(10 * 1024 * 1024);
    expect(preset.fieldName).toBe('file');
    expect(preset.destination).toBe(ROOT);
    expect(preset.maxFiles).toBe(1);
    expect(preset.sniffBytes).toBe(DEFAULT_SNIFF_BYTES);
    expect([...preset.allowedContentTypes]).toEqual([
      'image/jpeg',
      'image/png',
      'image/gif',
      'application/pdf',
    ]);
  });

  it('should place images and documents in their own directories', () => {
    expect(imageUploadConstraints(ROOT).destination).toBe(join(ROOT, 'images'));
    expect(documentUploadConstraints(ROOT).destination).toBe(
      join(ROOT, 'documents'),
    );
    expect(documentUploadConstraints(ROOT).sniffBytes).toBe(4100);
  });

  it('should derive the multi-image preset from the image preset', () => {
    const preset = multipleImageUploadConstraints(ROOT, 5);

    expect(preset.fieldName).toBe('images');
    expect(preset.maxFiles).toBe(5);
    expect(preset.maxSizeBytes).toBe(5 * 1024 * 1024);
    expect(preset.allowedExtensions.has('.webp')).toBe(true);
  });

  it('should lower-case extensions and freeze the set', () => {
    const preset = defineUploadConstraints({
      maxSizeBytes: 1,
      allowedExtensions: ['.PNG'],
      allowedContentTypes: ['image/png'],
      fieldName: 'f',
      required: true,
      maxFiles: 1,
      destination: ROOT,
    });

    expect([...preset.allowedExtensions]).toEqual(['.png']);
    expect(Object.isFrozen(preset)).toBe(true);
  });

  it.each([
    { maxSizeBytes: 0, maxFiles: 1, allowedExtensions: ['.png'] },
    { maxSizeBytes: 1, maxFiles: 0, allowedExtensions: ['.png'] },
    { maxSizeBytes: 1, maxFiles: 1, allowedExtensions: [] },
  ])('should reject %p', ({ maxSizeBytes, maxFiles, allowedExtensions }) => {
    expect(() =>
      defineUploadConstraints({
        maxSizeBytes,
        maxFiles,
        allowedExtensions,
        allowedContentTypes: ['image/png'],
        fieldName: 'f',
        required: true,
        destination: ROOT,
      }),
    ).toThrow(GatekeeperConfigError);
  });
});
