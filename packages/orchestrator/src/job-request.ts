import { randomUUID } from 'node:crypto';

import { z } from 'zod';

import { DEFAULT_JOB_PARAMS, ValidationError, type SceneJob } from '@splat-pipeline/contracts';

export const SCENE_ID_PATTERN = /^[A-Za-z0-9._-]{1,128}$/;

// Numeric strings are accepted for callers that send form-encoded values.
const positiveInt = z.preprocess(
  (value) => (typeof value === 'string' && value.trim() !== '' ? Number(value) : value),
  z.number().int().positive(),
);

export const JobRequestSchema = z.object({
  id: z.string().min(1).optional(),
  input: z.object({
    video_url: z.url({ protocol: /^https?$/ }),
    scene_id: z
      .string()
      .regex(SCENE_ID_PATTERN, 'scene_id may only contain letters, digits, ".", "_" and "-" (max 128)')
      .nullish(),
    params: z
      .object({
        iterations: positiveInt.optional(),
        fps: positiveInt.optional(),
      })
      .nullish(),
  }),
});

export type JobRequest = z.input<typeof JobRequestSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.map(String).join('.');
      return path ? `${path}: ${issue.message}` : issue.message;
    })
    .join('; ');
}

/** Validate a raw job request and fill in defaults. */
export function parseJobRequest(raw: unknown): SceneJob {
  const parsed = JobRequestSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError(`Invalid job request: ${formatIssues(parsed.error)}`, {
      cause: parsed.error,
    });
  }

  const { id, input } = parsed.data;
  return {
    jobId: id ?? randomUUID(),
    videoUrl: input.video_url,
    sceneId: input.scene_id ?? randomUUID(),
    params: {
      iterations: input.params?.iterations ?? DEFAULT_JOB_PARAMS.iterations,
      fps: input.params?.fps ?? DEFAULT_JOB_PARAMS.fps,
    },
  };
}
