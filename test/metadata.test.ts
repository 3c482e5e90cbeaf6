import { describe, expect, it } from 'vitest';

import { buildRecord, toItem } from '../src/models/metadata.js';

describe('buildRecord', () => {
  it('stores the size as a decimal string and both dates as ISO 8601', () => {
    expect(
      buildRecord(
        'holiday/beach.png',
        1048576,
        new Date('2026-03-04T05:06:07.000Z'),
        new Date('2026-10-18T09:00:00.000Z'),
        'thumbnails/holiday/beach.png.jpg',
      ),
    ).toEqual({
      imageName: 'holiday/beach.png',
      imageSize: '1048576',
      creationDate: '2026-03-04T05:06:07.000Z',
      processedDate: '2026-10-18T09:00:00.000Z',
      thumbnailKey: 'thumbnails/holiday/beach.png.jpg',
    });
  });
});

describe('toItem', () => {
  it('uses the table attribute names', () => {
    expect(
      toItem({
        imageName: 'a.png',
        imageSize: '12',
        creationDate: '2026-01-01T00:00:00.000Z',
        processedDate: '2026-01-02T00:00:00.000Z',
        thumbnailKey: 'thumbnails/a.png.jpg',
      }),
    ).toEqual({
      ImageName: 'a.png',
      ImageSize: '12',
      CreationDate: '2026-01-01T00:00:00.000Z',
      ProcessedDate: '2026-01-02T00:00:00.000Z',
      ThumbnailKey: 'thumbnails/a.png.jpg',
    });
  });
});
