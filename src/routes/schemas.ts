import { z } from 'zod';

export const ProspectSchema = z.object({
  firstName: z.string(),
  lastName: z.string(),
  company: z.string(),
  title: z.string().optional(),
  phone: z.string().optional(),
  country: z.string().optional(),
  linkedinProfile: z.string().optional(),
  sellingIntent: z.string().optional(),
});

export const ResearchSchema = z.object({
  linkedinConfidence: z.number().min(0).max(100).optional(),
  achievements: z.array(z.string()).optional(),
  companyAchievements: z.array(z.string()).optional(),
});

export const ScoreRequestSchema = z.object({
  email: z.string(),
  research: ResearchSchema.default({}),
  prospect: ProspectSchema,
});

export const TestRunRequestSchema = z.object({
  prospects: z.array(ProspectSchema).min(1),
  targetPassRate: z.number().min(0).max(1).optional(),
  timeoutMs: z.number().int().positive().optional(),
});

export const GenerateEmailRequestSchema = z.object({
  prospect: ProspectSchema,
  maxAttempts: z.number().int().min(1).max(10).optional(),
});

export const ImprovementRunRequestSchema = z.object({
  maxIterations: z.number().int().min(1).max(100).optional(),
  targetPassRate: z.number().min(0).max(1).optional(),
  numProspects: z.number().int().min(1).max(500).optional(),
  testOnly: z.boolean().optional(),
});

export function describeIssues(error: z.ZodError): string {
  return error.issues.map(i => `${i.path.join('.') || 'body'}: ${i.message}`).join('; ');
}
