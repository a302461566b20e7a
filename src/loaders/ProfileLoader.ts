import * as fs from 'fs/promises';
import { z } from 'zod';
import { Entry, Profile, Retention } from '../types';
import { IProfileLoader } from '../interfaces';
import { ProfileLoadError, errorMessage } from '../errors';

const retentionOrderSchema = z.enum(['fileName', 'created', 'modified']);

const patternExceptionSchema = z.enum(['firstAscending', 'firstDescending', 'mostRecent']);

const countRetentionSchema = z.object({
  order: retentionOrderSchema,
  count: z.number().int().nonnegative()
}).strict();

const exceptionRetentionSchema = z.object({
  exception: patternExceptionSchema
}).strict();

const pathEntrySchema = z.object({
  type: z.literal('path'),
  // An empty path is allowed here and dropped at canonicalization
  path: z.string()
});

const patternEntrySchema = z.object({
  type: z.literal('pattern'),
  pattern: z.string(),
  retention: z.union([countRetentionSchema, exceptionRetentionSchema]).optional(),
  exception: patternExceptionSchema.optional()
});

const entrySchema = z.discriminatedUnion('type', [pathEntrySchema, patternEntrySchema])
  .superRefine((entry, ctx) => {
    if (entry.type === 'pattern' && entry.retention && entry.exception) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'a pattern entry may set retention or exception, not both',
        path: ['exception']
      });
    }
  });

export const profileSchema = z.object({
  name: z.string(),
  entries: z.array(entrySchema)
});

type ProfileDocument = z.infer<typeof profileSchema>;
type EntryDocument = ProfileDocument['entries'][number];

/**
 * Loads profile documents from JSON files
 */
export class ProfileLoader implements IProfileLoader {
  /**
   * Read, parse and validate a profile
   */
  async load(profilePath: string): Promise<Profile> {
    let content: string;
    try {
      content = await fs.readFile(profilePath, 'utf-8');
    } catch (error) {
      throw new ProfileLoadError(profilePath, `failed to read file: ${errorMessage(error)}`, { cause: error });
    }

    return parseProfile(content, profilePath);
  }
}

/**
 * Parse and validate profile JSON text
 */
export function parseProfile(content: string, profilePath: string): Profile {
  let document: unknown;
  try {
    document = JSON.parse(content);
  } catch (error) {
    throw new ProfileLoadError(profilePath, `failed to deserialise value: ${errorMessage(error)}`, { cause: error });
  }

  const parsed = profileSchema.safeParse(document);
  if (!parsed.success) {
    throw new ProfileLoadError(profilePath, `invalid profile: ${formatIssues(parsed.error)}`, { cause: parsed.error });
  }

  return {
    name: parsed.data.name,
    entries: parsed.data.entries.map(toEntry)
  };
}

function toEntry(document: EntryDocument): Entry {
  if (document.type === 'path') {
    return { type: 'path', path: document.path };
  }

  const retention = toRetention(document);
  return retention
    ? { type: 'pattern', pattern: document.pattern, retention }
    : { type: 'pattern', pattern: document.pattern };
}

function toRetention(document: Extract<EntryDocument, { type: 'pattern' }>): Retention | undefined {
  if (document.retention) {
    return 'order' in document.retention
      ? { kind: 'count', order: document.retention.order, count: document.retention.count }
      : { kind: 'exception', exception: document.retention.exception };
  }

  if (document.exception) {
    return { kind: 'exception', exception: document.exception };
  }

  return undefined;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
    .join('; ');
}
