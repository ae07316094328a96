import { z } from 'zod';
import { NomadError, NomadErrorCode } from '../errors.js';

// A mistyped optional field reads as absent, so the record falls back to its default.
const lenientString = z.string().nullish().catch(undefined);
const lenientNumber = z.number().nullish().catch(undefined);
const lenientBoolean = z.boolean().nullish().catch(undefined);
const lenientIdList = z
  .array(z.unknown())
  .nullish()
  .catch(undefined)
  .transform((ids) => ids?.filter((id): id is string => typeof id === 'string' && id !== ''));

const solarCellNode = z
  .object({
    cell_area: lenientNumber,
    efficiency: lenientNumber,
  })
  .passthrough();

export const rawEntrySchema = z
  .object({
    entry_id: lenientString,
    upload_id: lenientString,
    data: z
      .object({
        name: lenientString,
        lab_id: lenientString,
      })
      .passthrough()
      .nullish()
      .catch(undefined),
    results: z
      .object({
        properties: z
          .object({
            optoelectronic: z
              .object({ solar_cell: solarCellNode.nullish().catch(undefined) })
              .passthrough()
              .nullish()
              .catch(undefined),
          })
          .passthrough()
          .nullish()
          .catch(undefined),
      })
      .passthrough()
      .nullish()
      .catch(undefined),
  })
  .passthrough();

export type RawEntry = z.infer<typeof rawEntrySchema>;

export const entriesPageSchema = z
  .object({
    data: z.array(z.unknown()).default([]),
    pagination: z
      .object({
        total: z.number().int().nonnegative().nullish(),
        page: z.number().int().nullish(),
        page_size: z.number().int().nullish(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

export const dataListSchema = z
  .object({
    data: z.array(z.record(z.unknown())).default([]),
  })
  .passthrough();

export const uploadSchema = z
  .object({
    upload_id: lenientString,
    upload_name: lenientString,
    upload_create_time: lenientString,
    main_author: lenientString,
    coauthors: lenientIdList,
    coauthor_groups: lenientIdList,
    published: lenientBoolean,
    license: lenientString,
  })
  .passthrough();

export type UploadInfo = z.infer<typeof uploadSchema>;

export const uploadResponseSchema = z
  .object({
    upload_id: z.string().nullish(),
    data: uploadSchema.default({}),
  })
  .passthrough();

export const userSchema = z
  .object({
    user_id: z.string().nullish(),
    name: z.string().nullish(),
    username: z.string().nullish(),
    email: z.string().nullish(),
    first_name: z.string().nullish(),
    last_name: z.string().nullish(),
  })
  .passthrough();

export type UserInfo = z.infer<typeof userSchema>;

export const groupSchema = z
  .object({
    group_id: z.string(),
    group_name: z.string().nullish(),
    owner: z.string().nullish(),
    members: z.array(z.string()).nullish(),
  })
  .passthrough();

export type GroupInfo = z.infer<typeof groupSchema>;

export const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().nullish(),
});

export const archiveItemSchema = z
  .object({
    archive: z
      .object({
        data: z.record(z.unknown()).default({}),
      })
      .passthrough(),
  })
  .passthrough();

/** Parses a response body, reporting shape mismatches as a NomadError rather than a ZodError. */
export function parseResponse<T extends z.ZodTypeAny>(schema: T, value: unknown, path: string): z.output<T> {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new NomadError(NomadErrorCode.RESPONSE_SHAPE, `Unexpected response shape from ${path}`, {
      path,
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    });
  }
  return parsed.data;
}
