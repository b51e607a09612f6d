/**
 * Zod schemas for Cucumber-style JSON reports (Karate, cucumber-jvm, cucumber-js)
 */

import { z } from 'zod';

export const tagSchema = z
  .object({
    name: z.string(),
  })
  .passthrough();

export const stepResultSchema = z
  .object({
    status: z.string({ required_error: 'step result status is required' }),

    /**
     * Nanoseconds
     */
    duration: z.number().nonnegative().optional(),

    error_message: z.string().optional(),
  })
  .passthrough();

export const stepSchema = z
  .object({
    keyword: z.string().default(''),
    name: z.string().default(''),
    result: stepResultSchema,
  })
  .passthrough();

export const elementSchema = z
  .object({
    // Backgrounds are often unnamed
    name: z.string().trim().default(''),
    type: z.string({ required_error: 'element type is required' }),
    keyword: z.string().default(''),

    /**
     * cucumber-jvm: `<feature>;<outline>;<examples>;<row>` for outline rows
     */
    id: z.string().optional(),

    description: z.string().optional(),
    status: z.string().optional(),
    tags: z.array(tagSchema).default([]),
    steps: z.array(stepSchema).default([]),
    examples: z
      .array(
        z
          .object({
            id: z.string().optional(),
            tags: z.array(tagSchema).default([]),

            /**
             * Header row first, then one row per example
             */
            rows: z.array(z.unknown()).optional(),
          })
          .passthrough()
      )
      .optional(),
  })
  .passthrough()
  .superRefine((element, ctx) => {
    if (element.name.length === 0 && element.type.toLowerCase() !== 'background') {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['name'], message: 'scenario name is required' });
    }
  });

export const featureSchema = z
  .object({
    name: z.string({ required_error: 'feature name is required' }).trim().min(1, 'feature name is empty'),
    uri: z.string().optional(),
    description: z.string().optional(),
    elements: z.array(elementSchema).default([]),
  })
  .passthrough();

export type RawStep = z.infer<typeof stepSchema>;
export type RawElement = z.infer<typeof elementSchema>;
export type RawExamples = NonNullable<RawElement['examples']>[number];
export type RawFeature = z.infer<typeof featureSchema>;
