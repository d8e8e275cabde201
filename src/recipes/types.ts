import { z } from 'zod';

/**
 * Recipe files describe how a playlist type is prompted.
 *
 * Two on-disk shapes exist. Indexed recipes carry an `llm_config` block and are sent
 * to the model together with index-addressed tracks. Legacy recipes carry a
 * `prompt_template` with `{placeholder}` fields and exchange real track ids.
 */

export const registrySchema = z.record(z.string(), z.string());
export type RecipeRegistry = z.infer<typeof registrySchema>;

const strategyNotesSchema = z.record(z.string(), z.unknown());

export const indexedRecipeSchema = z.object({
  name: z.string().optional(),
  version: z.string(),
  description: z.string(),
  inputs: z.array(z.string()),
  llm_config: z.object({
    system_prompt: z.string(),
    model_instructions: z.string(),
    temperature: z.number().min(0).max(2).default(0.7),
    max_tokens: z.number().int().positive().default(1500)
  }),
  strategy_notes: strategyNotesSchema.default({})
});
export type IndexedRecipe = z.infer<typeof indexedRecipeSchema>;

export const legacyRecipeSchema = z.object({
  name: z.string().optional(),
  version: z.string(),
  description: z.string(),
  inputs: z.array(z.string()),
  prompt_template: z.string().nullable(),
  prompt_template_with_reasoning: z.string().optional(),
  system_prompt: z.string().optional(),
  llm_params: z
    .object({
      temperature: z.number().min(0).max(2).optional(),
      max_tokens: z.number().int().positive().optional(),
      model_fallback: z.string().optional()
    })
    .optional(),
  strategy_notes: strategyNotesSchema.default({})
});
export type LegacyRecipe = z.infer<typeof legacyRecipeSchema>;

export type RecipeFormat = 'indexed' | 'legacy';

/**
 * Format is resolved once, when the file is loaded.
 */
export type LoadedRecipe =
  | { format: 'indexed'; filename: string; definition: IndexedRecipe }
  | { format: 'legacy'; filename: string; definition: LegacyRecipe };

export interface RecipeInputs {
  numTracks: number;
  targetArtist?: string;
  analysisSummary?: string;
  varietyContext?: string;
}

/**
 * Recipe after placeholder and `{{MATH:...}}` substitution, ready for the prompt builder.
 *
 * For legacy recipes `instructions` still contains the `{tracks_data}` field;
 * the prompt builder fills it with the track list.
 */
export interface AppliedRecipe {
  format: RecipeFormat;
  filename: string;
  name: string;
  version: string;
  description: string;
  systemPrompt: string;
  instructions: string;
  temperature: number;
  maxTokens: number;
  strategyNotes: Record<string, unknown>;
}

export interface RecipeSummary {
  filename: string;
  version?: string;
  description?: string;
  format?: RecipeFormat;
  inputs?: string[];
  usesLlm?: boolean;
  error?: string;
}

export class RecipeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RecipeError';
  }
}
