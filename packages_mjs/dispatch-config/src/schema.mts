/**
 * Zod schemas for dispatch configuration
 */
import { z } from 'zod';
import { proxyUrlProblem } from '@llm-dispatch/fetch-proxy-config';

const HTTP_URL = /^https?:\/\//;

export const ProviderSettingsSchema = z.object({
  providerId: z.string().min(1),
  apiKey: z.string().default(''),
  baseUrl: z.string().url().regex(HTTP_URL, 'must be an http(s) URL'),
  provider: z.enum(['openai', 'gemini']).default('openai'),
  timeoutMs: z.coerce.number().int().positive().optional(),
  proxyUrl: z
    .string()
    .superRefine((value, ctx) => {
      const problem = proxyUrlProblem(value);
      if (problem !== undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: problem });
      }
    })
    .optional(),
  completionPath: z.string().optional(),
});

export const DispatchConfigSchema = z.object({
  providers: z
    .array(ProviderSettingsSchema)
    .min(1, 'at least one provider id is required')
    .superRefine((providers, ctx) => {
      const seen = new Set<string>();
      for (const { providerId } of providers) {
        if (seen.has(providerId)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, message: `duplicate provider id ${providerId}` });
        }
        seen.add(providerId);
      }
    }),
  policy: z.enum(['first-success', 'all-required', 'best-effort']).default('best-effort'),
  deadlineMs: z.coerce.number().int().positive().optional(),
  maxConnections: z.coerce.number().int().positive().default(100),
});

export type ProviderSettings = z.infer<typeof ProviderSettingsSchema>;
export type DispatchConfig = z.infer<typeof DispatchConfigSchema>;
