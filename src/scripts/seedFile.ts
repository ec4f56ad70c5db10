/**
 * Seed file decoding
 * Layer: Entry Point (CLI)
 *
 * A seed file is a JSON array of posts with flat `latitude`/`longitude`
 * fields and ISO-8601 `createdAt` strings. Decoding turns each entry into a
 * NewPost; range checks are left to the writer, which applies the same rules
 * to every insert.
 */
import type { NewPost } from '@domain/entities/Post';
import { postMetadataSchema } from '@domain/entities/PostMetadata';
import { ValidationError } from '@shared/errors/AppError';
import { z } from 'zod';

const seedPostSchema = z
  .object({
    id: z.string().min(1).optional(),
    userId: z.string().min(1),
    content: z.string(),
    imageUrl: z.string().nullish(),
    city: z.string().min(1).nullish(),
    latitude: z.number().nullish(),
    longitude: z.number().nullish(),
    metadata: postMetadataSchema.optional(),
    createdAt: z.iso.datetime({ offset: true }).optional(),
  })
  .refine((post) => (post.latitude == null) === (post.longitude == null), {
    error: 'latitude and longitude must be given together',
  });

export const seedFileSchema = z.array(seedPostSchema);

export function parseSeedFile(input: unknown): NewPost[] {
  const result = seedFileSchema.safeParse(input);
  if (!result.success) {
    const messages = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
    );
    throw new ValidationError(`Invalid seed file: ${messages.join('; ')}`);
  }

  return result.data.map(({ latitude, longitude, createdAt, ...post }) => ({
    ...post,
    location: latitude != null && longitude != null ? { latitude, longitude } : null,
    createdAt: createdAt === undefined ? undefined : new Date(createdAt),
  }));
}
