import { readFileSync } from 'node:fs';
import { join } from 'node:path';

import { logger } from '../logger.js';
import { evaluateMathExpression } from './math-expression.js';
import {
  RecipeError,
  indexedRecipeSchema,
  legacyRecipeSchema,
  registrySchema,
  type AppliedRecipe,
  type LoadedRecipe,
  type RecipeInputs,
  type RecipeRegistry,
  type RecipeSummary
} from './types.js';

const MATH_PATTERN = /\{\{MATH:([^}]+)\}\}/g;
const LEGACY_FIELD_PATTERN = /\{(\w+)\}/g;

/** Filled by the prompt builder, not by recipe inputs */
export const TRACKS_DATA_FIELD = 'tracks_data';

const LEGACY_SYSTEM_PROMPT = 'You are a professional music curator. Always respond with valid JSON only.';

/**
 * Apply `fn` to every string inside a JSON-like value.
 */
const mapStrings = (value: unknown, fn: (text: string) => string): unknown => {
  if (typeof value === 'string') {
    return fn(value);
  }
  if (Array.isArray(value)) {
    return value.map(item => mapStrings(item, fn));
  }
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, mapStrings(item, fn)]));
  }
  return value;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  value !== null && typeof value === 'object' && !Array.isArray(value);

const readJson = (path: string, label: string): unknown => {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch {
    throw new RecipeError(`${label} not found: ${path}`);
  }
  try {
    return JSON.parse(content);
  } catch (error) {
    throw new RecipeError(`Invalid JSON in ${label} ${path}: ${error instanceof Error ? error.message : String(error)}`);
  }
};

/**
 * Loads playlist recipes from `<recipesDir>/registry.json` and the files it names.
 * Registry and recipe files are cached until `clearCache()`.
 */
export class RecipeManager {
  private registryCache: RecipeRegistry | null = null;
  private readonly recipeCache = new Map<string, LoadedRecipe>();

  constructor(private readonly recipesDir: string) {}

  private loadRegistry(): RecipeRegistry {
    if (this.registryCache) {
      return this.registryCache;
    }
    const parsed = registrySchema.safeParse(readJson(join(this.recipesDir, 'registry.json'), 'recipe registry'));
    if (!parsed.success) {
      throw new RecipeError(`Recipe registry must map playlist types to file names: ${parsed.error.message}`);
    }
    this.registryCache = parsed.data;
    return parsed.data;
  }

  private loadRecipe(filename: string): LoadedRecipe {
    const cached = this.recipeCache.get(filename);
    if (cached) {
      return cached;
    }

    const raw = readJson(join(this.recipesDir, filename), 'recipe file');
    let recipe: LoadedRecipe;

    if (isRecord(raw) && 'llm_config' in raw) {
      const parsed = indexedRecipeSchema.safeParse(raw);
      if (!parsed.success) {
        throw new RecipeError(`Invalid recipe ${filename}: ${parsed.error.issues.map(issue => issue.message).join('; ')}`);
      }
      recipe = { format: 'indexed', filename, definition: parsed.data };
    } else if (isRecord(raw) && 'prompt_template' in raw) {
      const parsed = legacyRecipeSchema.safeParse(raw);
      if (!parsed.success) {
        throw new RecipeError(`Invalid recipe ${filename}: ${parsed.error.issues.map(issue => issue.message).join('; ')}`);
      }
      recipe = { format: 'legacy', filename, definition: parsed.data };
    } else {
      throw new RecipeError(`Recipe ${filename} has neither llm_config nor prompt_template`);
    }

    logger.debug({ filename, format: recipe.format, version: recipe.definition.version }, 'loaded recipe');
    this.recipeCache.set(filename, recipe);
    return recipe;
  }

  getRecipe(playlistType: string): LoadedRecipe {
    const registry = this.loadRegistry();
    const filename = Object.hasOwn(registry, playlistType) ? registry[playlistType] : undefined;
    if (!filename) {
      throw new RecipeError(`No recipe registered for playlist type: ${playlistType}`);
    }
    return this.loadRecipe(filename);
  }

  /**
   * Resolve the recipe for `playlistType` and substitute its placeholders.
   */
  applyRecipe(playlistType: string, inputs: RecipeInputs, includeReasoning = false): AppliedRecipe {
    const recipe = this.getRecipe(playlistType);
    return recipe.format === 'indexed'
      ? this.applyIndexed(recipe, inputs)
      : this.applyLegacy(recipe, inputs, includeReasoning);
  }

  private applyIndexed(recipe: Extract<LoadedRecipe, { format: 'indexed' }>, inputs: RecipeInputs): AppliedRecipe {
    const replacements = new Map<string, string>([['{{DESIRED_TRACK_COUNT}}', String(inputs.numTracks)]]);
    if (inputs.targetArtist !== undefined) {
      replacements.set('{{TARGET_ARTIST}}', inputs.targetArtist);
    }
    if (inputs.analysisSummary !== undefined) {
      replacements.set('{{ANALYSIS_SUMMARY}}', inputs.analysisSummary);
    }
    replacements.set('{{VARIETY_CONTEXT}}', inputs.varietyContext ?? '');

    // Math first: expressions may reference DESIRED_TRACK_COUNT by bare name
    const substitute = (text: string): string => {
      let result = this.evaluateMath(text, inputs.numTracks);
      for (const [placeholder, replacement] of replacements) {
        result = result.split(placeholder).join(replacement);
      }
      return result;
    };

    const { llm_config: config, strategy_notes: strategyNotes } = recipe.definition;
    const instructions = substitute(config.model_instructions);
    if (instructions.includes('{{TARGET_ARTIST}}') || instructions.includes('{{DESIRED_TRACK_COUNT}}')) {
      logger.warn({ filename: recipe.filename }, 'recipe placeholders left unreplaced in model instructions');
    }

    const notes = mapStrings(strategyNotes, substitute);
    return {
      format: 'indexed',
      filename: recipe.filename,
      name: recipe.definition.name ?? recipe.filename,
      version: recipe.definition.version,
      description: recipe.definition.description,
      systemPrompt: substitute(config.system_prompt),
      instructions,
      temperature: config.temperature,
      maxTokens: config.max_tokens,
      strategyNotes: isRecord(notes) ? notes : {}
    };
  }

  private applyLegacy(
    recipe: Extract<LoadedRecipe, { format: 'legacy' }>,
    inputs: RecipeInputs,
    includeReasoning: boolean
  ): AppliedRecipe {
    const { definition } = recipe;
    const template = includeReasoning && definition.prompt_template_with_reasoning
      ? definition.prompt_template_with_reasoning
      : definition.prompt_template;

    if (template === null) {
      throw new RecipeError(`Recipe ${recipe.filename} does not use an LLM`);
    }

    const values = new Map<string, string>([['num_tracks', String(inputs.numTracks)]]);
    if (inputs.targetArtist !== undefined) {
      values.set('artists', inputs.targetArtist);
      values.set('artist_name', inputs.targetArtist);
    }
    if (inputs.analysisSummary !== undefined) {
      values.set('analysis_summary', inputs.analysisSummary);
    }
    values.set('variety_context', inputs.varietyContext ?? '');

    const missing = definition.inputs.filter(
      name => name !== TRACKS_DATA_FIELD && !values.has(name)
    );
    if (missing.length > 0) {
      throw new RecipeError(`Missing required inputs for ${recipe.filename}: ${missing.join(', ')}`);
    }

    const instructions = template.replace(LEGACY_FIELD_PATTERN, (match, field: string) => {
      if (field === TRACKS_DATA_FIELD) {
        return match;
      }
      const value = values.get(field);
      if (value === undefined) {
        throw new RecipeError(`Missing template variable in recipe ${recipe.filename}: ${field}`);
      }
      return value;
    });

    return {
      format: 'legacy',
      filename: recipe.filename,
      name: definition.name ?? recipe.filename,
      version: definition.version,
      description: definition.description,
      systemPrompt: definition.system_prompt ?? LEGACY_SYSTEM_PROMPT,
      instructions,
      temperature: definition.llm_params?.temperature ?? 0.7,
      maxTokens: definition.llm_params?.max_tokens ?? 1000,
      strategyNotes: definition.strategy_notes
    };
  }

  private evaluateMath(text: string, numTracks: number): string {
    return text.replace(MATH_PATTERN, (match, expression: string) => {
      const resolved = expression.split('DESIRED_TRACK_COUNT').join(String(numTracks));
      try {
        return String(evaluateMathExpression(resolved));
      } catch (error) {
        logger.warn({ expression: resolved, err: error }, 'recipe math expression failed, leaving placeholder');
        return match;
      }
    });
  }

  listAvailableRecipes(): Record<string, RecipeSummary> {
    const registry = this.loadRegistry();
    const summaries: Record<string, RecipeSummary> = {};

    for (const [playlistType, filename] of Object.entries(registry)) {
      try {
        const recipe = this.loadRecipe(filename);
        summaries[playlistType] = {
          filename,
          version: recipe.definition.version,
          description: recipe.definition.description,
          format: recipe.format,
          inputs: recipe.definition.inputs,
          usesLlm: recipe.format === 'indexed' || recipe.definition.prompt_template !== null
        };
      } catch (error) {
        summaries[playlistType] = { filename, error: error instanceof Error ? error.message : String(error) };
      }
    }

    return summaries;
  }

  /**
   * Check a recipe file and return a list of problems (empty when valid).
   */
  validateRecipe(filename: string): string[] {
    const errors: string[] = [];
    let raw: unknown;
    try {
      raw = readJson(join(this.recipesDir, filename), 'recipe file');
    } catch (error) {
      return [`Failed to load recipe: ${error instanceof Error ? error.message : String(error)}`];
    }

    if (!isRecord(raw)) {
      return ['Recipe must be a JSON object'];
    }

    for (const field of ['version', 'description', 'inputs', 'strategy_notes']) {
      if (!(field in raw)) {
        errors.push(`Missing required field: ${field}`);
      }
    }

    const inputs = raw.inputs;
    if ('inputs' in raw && !Array.isArray(inputs)) {
      errors.push("'inputs' must be a list");
    }

    const template = raw.prompt_template;
    if (typeof template === 'string') {
      const declared: unknown[] = Array.isArray(inputs) ? inputs : [];
      for (const [, placeholder] of template.matchAll(LEGACY_FIELD_PATTERN)) {
        if (!declared.includes(placeholder) && placeholder !== TRACKS_DATA_FIELD && placeholder !== 'num_tracks') {
          errors.push(`Placeholder '${placeholder}' in prompt_template not found in inputs`);
        }
      }
    }

    for (const key of ['llm_params', 'llm_config']) {
      if (!(key in raw)) continue;
      const params = raw[key];
      if (!isRecord(params)) {
        errors.push(`'${key}' must be an object`);
        continue;
      }
      if ('temperature' in params) {
        const temperature = params.temperature;
        if (typeof temperature !== 'number' || temperature < 0 || temperature > 2) {
          errors.push("'temperature' must be a number between 0 and 2");
        }
      }
    }

    if (!('llm_config' in raw) && !('prompt_template' in raw)) {
      errors.push('Recipe must define llm_config or prompt_template');
    }

    return errors;
  }

  clearCache(): void {
    this.registryCache = null;
    this.recipeCache.clear();
  }
}
