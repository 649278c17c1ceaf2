import { z } from 'zod';

export const StratumConfigSchema = z.object({
  id: z.union([z.string().min(1), z.number()]).transform(String),
  population_size: z.number().int().positive(),
  std_dev: z.number().nonnegative(),
  unit_cost: z.number().positive(),
  unit_time: z.number().positive(),
});

const PrecisionConfigSchema = z.object({
  margin_of_error: z.number().positive(),
  // Either an explicit z-score or a confidence level looked up in the z table
  confidence_z: z.number().positive().optional(),
  confidence_level: z.number().gt(0).lt(1).optional(),
}).refine(p => p.confidence_z === undefined || p.confidence_level === undefined, {
  message: 'Set confidence_z or confidence_level, not both',
});

const AllocationConfigSchema = z.object({
  methods: z.array(z.enum(['proportional', 'neyman', 'cost-optimum', 'time-optimum']))
    .min(1)
    .default(['proportional', 'neyman', 'cost-optimum']),
  rounding: z.enum(['independent', 'largest-remainder']).default('independent'),
});

export const SurveyConfigSchema = z.object({
  version: z.string().default('1.0.0'),
  precision: PrecisionConfigSchema,
  allocation: AllocationConfigSchema.default({
    methods: ['proportional', 'neyman', 'cost-optimum'],
    rounding: 'independent',
  }),
  strata: z.array(StratumConfigSchema).min(1),
});

export type StratumConfig = z.infer<typeof StratumConfigSchema>;
export type SurveyConfig = z.infer<typeof SurveyConfigSchema>;

export function parseSurveyConfig(data: unknown): SurveyConfig {
  return SurveyConfigSchema.parse(data);
}
