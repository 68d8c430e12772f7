import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import request from 'supertest';
import { hasErrorCode } from '../src/gatekeeper/errors';
import { exeBytes, gifBytes, jpegBytes } from './support/file-bytes';
import { createTestApp, type TestApp } from './support/test-app';

async function filesIn(directory: string): Promise<string[]> {
  try {
    return await readdir(directory);
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) {
      return [];
    }
    throw error;
  }
}

describe('Uploads (e2e)', () => {
  let t: TestApp;
  let imagesDir: string;

  beforeAll(async () => {
    t = await createTestApp();
    imagesDir = join(t.uploadRoot, 'images');
  });

  afterAll(async () => {
    await t.close();
  });

  function upload(path: string, clientIp: string, role = 'user') {
    return request(t.app.getHttpServer())
      .post(`/api/v1/files${path}`)
      .set('X-Forwarded-For', clientIp)
      .set('Authorization', t.bearer(role));
  }

  it('should store a valid image and describe it', async () => {
    const bytes = jpegBytes(2048);

    const response = await upload('/upload/image', '192.0.2.1').attach(
      'image',
      bytes,
      'holiday photo.jpg',
    );

    expect(response.status).toBe(200);
    expect(response.body.success).toBe(true);
    expect(response.body.message).toBe('File(s) uploaded successfully');
    expect(response.body.data.count).toBe(1);

    const [file] = response.body.data.files;
    expect(file).toEqual({
      originalName: 'holiday photo.jpg',
      filename: expect.stringMatching(/^holiday_photo_\d+_[0-9a-f-]{36}\.jpg$/),
      size: 2048,
      path: `${imagesDir}/${file.filename}`,
      uploadedAt: new Date(t.clock.now()).toISOString(),
      contentType: 'image/jpeg',
    });
    await expect(readFile(file.path)).resolves.toEqual(bytes);
  });

  it('should store several images in one request', async () => {
    const response = await upload('/upload/images', '192.0.2.2')
      .attach('images', jpegBytes(), 'one.jpg')
      .attach('images', gifBytes(), 'two.gif');

    expect(response.status).toBe(200);
    expect(response.body.data.count).toBe(2);
    expect(
      response.body.data.files.map(
        (file: { contentType: string }) => file.contentType,
      ),
    ).toEqual(['image/jpeg', 'image/gif']);
  });

  it('should refuse an executable named like an image and keep nothing', async () => {
    const before = await filesIn(imagesDir);

    const response = await upload('/upload/image', '192.0.2.3').attach(
      'image',
      exeBytes(),
      'invoice.jpg',
    );

    expect(response.status).toBe(400);
    expect(response.body).toEqual({
      success: false,
      message:
        "File type 'application/x-msdownload' not allowed. Allowed types: image/jpeg, image/png, image/gif, image/webp",
      error: 'DisallowedContentType',
    });
    expect(await filesIn(imagesDir)).toEqual(before);
  });

  it('should refuse a disallowed extension', async () => {
    const response = await upload('/upload', '192.0.2.4').attach(
      'file',
      jpegBytes(),
      'notes.txt',
    );

    expect(response.status).toBe(400);
    expect(response.body).toEqual({
      success: false,
      message:
        "File extension '.txt' not allowed. Allowed extensions: .jpg, .jpeg, .png, .gif, .pdf",
      error: 'DisallowedExtension',
    });
  });

  it('should require the route field', async () => {
    const response = await upload('/upload/image', '192.0.2.5').attach(
      'file',
      jpegBytes(),
      'cat.jpg',
    );

    expect(response.status).toBe(400);
    expect(response.body).toEqual({
      success: false,
      message: "File field 'image' is required",
      error: 'FileRequired',
    });
  });

  it('should refuse more images than the route allows', async () => {
    let req = upload('/upload/images', '192.0.2.6');
    for (let i = 0; i < 6; i++) {
      req = req.attach('images', jpegBytes(), `img-${i}.jpg`);
    }

    const response = await req;

    expect(response.status).toBe(400);
    expect(response.body).toEqual({
      success: false,
      message: 'Maximum 5 files allowed',
      error: 'TooManyFiles',
    });
  });

  describe('check order', () => {
    const MiB = 1024 * 1024;

    it('should report the file count before the size of any part', async () => {
      const response = await upload('/upload/image', '192.0.2.9')
        .attach('image', jpegBytes(6 * MiB), 'huge.jpg')
        .attach('image', jpegBytes(), 'small.jpg');

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        success: false,
        message: 'Maximum 1 files allowed',
        error: 'TooManyFiles',
      });
    });

    it('should report a missing field before an oversize part under another field', async () => {
      const response = await upload('/upload/image', '192.0.2.10').attach(
        'avatar',
        jpegBytes(6 * MiB),
        'huge.jpg',
      );

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        success: false,
        message: "File field 'image' is required",
        error: 'FileRequired',
      });
    });

    it('should ignore files under other fields when counting', async () => {
      const response = await upload('/upload/image', '192.0.2.11')
        .attach('image', jpegBytes(), 'cat.jpg')
        .attach('other', jpegBytes(), 'dog.jpg')
        .attach('other', jpegBytes(), 'bird.jpg');

      expect(response.status).toBe(200);
      expect(response.body.data.count).toBe(1);
      expect(response.body.data.files[0].originalName).toBe('cat.jpg');
    });

    it('should accept an image of exactly the size limit', async () => {
      const response = await upload('/upload/image', '192.0.2.12').attach(
        'image',
        jpegBytes(5 * MiB),
        'exact.jpg',
      );

      expect(response.status).toBe(200);
      expect(response.body.data.files[0].size).toBe(5 * MiB);
    });

    it('should refuse an image one byte over the size limit', async () => {
      const response = await upload('/upload/image', '192.0.2.13').attach(
        'image',
        jpegBytes(5 * MiB + 1),
        'over.jpg',
      );

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        success: false,
        message: 'File size exceeds maximum allowed size of 5242880 bytes',
        error: 'FileTooLarge',
      });
    });

    it('should accept an image whose whole name is its extension', async () => {
      const response = await upload('/upload/image', '192.0.2.14').attach(
        'image',
        jpegBytes(),
        '.jpg',
      );

      expect(response.status).toBe(200);
      expect(response.body.data.files[0].filename).toMatch(
        /^upload_\d+_[0-9a-f-]{36}\.jpg$/,
      );
    });
  });

  it('should not read uploads from unauthenticated clients', async () => {
    const before = await filesIn(imagesDir);

    const response = await request(t.app.getHttpServer())
      .post('/api/v1/files/upload/image')
      .set('X-Forwarded-For', '192.0.2.7')
      .attach('image', jpegBytes(), 'cat.jpg');

    expect(response.status).toBe(401);
    expect(await filesIn(imagesDir)).toEqual(before);
  });

  it('should apply the strict class to image uploads', async () => {
    const statuses: number[] = [];
    for (let i = 0; i < 3; i++) {
      const response = await request(t.app.getHttpServer())
        .post('/api/v1/files/upload/image')
        .set('X-Forwarded-For', '192.0.2.8')
        .attach('image', jpegBytes(), 'cat.jpg');
      statuses.push(response.status);
    }

    expect(statuses).toEqual([401, 401, 429]);
  });
});
