export type MetadataRecord = {
  imageName: string;
  // Decimal byte count, kept as a string to match the existing table items
  imageSize: string;
  creationDate: string;
  processedDate: string;
  thumbnailKey: string;
};

export type MetadataItem = {
  ImageName: string;
  ImageSize: string;
  CreationDate: string;
  ProcessedDate: string;
  ThumbnailKey: string;
};

export const buildRecord = (
  imageName: string,
  sizeBytes: number,
  lastModified: Date,
  processedAt: Date,
  thumbnailKey: string,
): MetadataRecord => ({
  imageName,
  imageSize: sizeBytes.toString(),
  creationDate: lastModified.toISOString(),
  processedDate: processedAt.toISOString(),
  thumbnailKey,
});

export const toItem = (record: MetadataRecord): MetadataItem => ({
  ImageName: record.imageName,
  ImageSize: record.imageSize,
  CreationDate: record.creationDate,
  ProcessedDate: record.processedDate,
  ThumbnailKey: record.thumbnailKey,
});
