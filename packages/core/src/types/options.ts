import { z } from 'zod';

export const LANGUAGES = ['en', 'de'] as const;

export type Language = (typeof LANGUAGES)[number];

export const conversionOptionsSchema = z.object({
  defaultAssigneeEmail: z.string().optional(),
  includeCompleted: z.boolean().default(false),
  language: z.enum(LANGUAGES).default('en'),
  dryRun: z.boolean().default(false),
  verbose: z.boolean().default(false),
  flattenSubtasks: z.boolean().default(true),
  assigneeNameColumn: z.boolean().default(false),
});

/** Run-time options, fixed for one conversion run. */
export type ConversionOptions = Readonly<z.output<typeof conversionOptionsSchema>>;

export type ConversionOptionsInput = z.input<typeof conversionOptionsSchema>;

/**
 * Validate options and fill in defaults.
 * Throws when a value has the wrong type or the language is not supported.
 */
export function resolveOptions(
  input: ConversionOptionsInput | Readonly<Record<string, unknown>> = {},
): ConversionOptions {
  const parsed = conversionOptionsSchema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.') || 'options'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid conversion options: ${details}`);
  }
  return Object.freeze(parsed.data);
}

export function isLanguage(value: string): value is Language {
  return LANGUAGES.some(lang => lang === value);
}
