import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { RecipeManager } from '../recipe-manager.js';

vi.mock('../../logger.js', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  }
}));

const SHIPPED_RECIPES = fileURLToPath(new URL('../../../recipes', import.meta.url));

describe('RecipeManager with the shipped recipes', () => {
  const manager = new RecipeManager(SHIPPED_RECIPES);

  it('fills the This Is recipe', () => {
    const recipe = manager.applyRecipe('this_is', { numTracks: 20, targetArtist: 'Test Artist' });

    expect(recipe.format).toBe('indexed');
    expect(recipe.name).toBe('This Is');
    expect(recipe.version).toBe('2.0');
    expect(recipe.temperature).toBe(0.7);
    expect(recipe.maxTokens).toBe(1500);
    expect(recipe.instructions.startsWith('Create a 20-track "This Is Test Artist" playlist')).toBe(true);
    expect(recipe.instructions).toContain('Open with 3 of the most played tracks as anchors');
    expect(recipe.instructions).not.toContain('{{');
    expect(recipe.strategyNotes.anchor_tracks).toBe('3 most played tracks open the playlist');
  });

  it('fills the Re-Discover recipe including nested strategy notes', () => {
    const recipe = manager.applyRecipe('re_discover', { numTracks: 40, analysisSummary: 'Summary here' });

    expect(recipe.instructions).toContain('Select exactly 40 tracks');
    expect(recipe.instructions).toContain('Summary here');
    expect(recipe.strategyNotes.diversity_controls).toEqual({ max_per_artist: '5' });
    expect(recipe.strategyNotes.time_windows).toEqual({
      analysis_period: '30 days',
      minimum_gap: '7+ days',
      maximum_gap: '120 days'
    });
  });

  it('rejects unregistered playlist types', () => {
    expect(() => manager.applyRecipe('nope', { numTracks: 5 })).toThrow('No recipe registered for playlist type: nope');
    expect(() => manager.applyRecipe('constructor', { numTracks: 5 })).toThrow(
      'No recipe registered for playlist type: constructor'
    );
  });

  it('lists and validates every registered recipe', () => {
    const summaries = manager.listAvailableRecipes();

    expect(Object.keys(summaries).sort()).toEqual(['re_discover', 'this_is']);
    expect(summaries.this_is).toMatchObject({ filename: 'this_is_v2.json', format: 'indexed', usesLlm: true });
    expect(manager.validateRecipe('this_is_v2.json')).toEqual([]);
    expect(manager.validateRecipe('re_discover_v2.json')).toEqual([]);
  });
});

describe('RecipeManager with custom recipes', () => {
  let dir: string;

  const write = (name: string, content: unknown) =>
    writeFileSync(join(dir, name), typeof content === 'string' ? content : JSON.stringify(content));

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'recipes-'));
    write('registry.json', {
      legacy: 'legacy.json',
      nollm: 'nollm.json',
      broken: 'broken.json',
      missing: 'gone.json',
      mathfail: 'mathfail.json'
    });
    write('legacy.json', {
      version: '1.0',
      description: 'Legacy recipe',
      inputs: ['num_tracks', 'artist_name', 'tracks_data'],
      prompt_template: 'Pick {num_tracks} by {artist_name} from {tracks_data}',
      prompt_template_with_reasoning: 'Pick {num_tracks} by {artist_name} from {tracks_data} and explain',
      llm_params: { temperature: 0.4 },
      strategy_notes: {}
    });
    write('nollm.json', {
      version: '1.0',
      description: 'Algorithmic only',
      inputs: [],
      prompt_template: null,
      strategy_notes: {}
    });
    write('broken.json', '{ not json');
    write('mathfail.json', {
      version: '1.0',
      description: 'Bad math',
      inputs: ['num_tracks'],
      llm_config: {
        system_prompt: 'Curate.',
        model_instructions: 'Pick {{MATH:DESIRED_TRACK_COUNT / 0}} of {{DESIRED_TRACK_COUNT}} tracks'
      }
    });
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('fills legacy fields and keeps the track data field for the prompt builder', () => {
    const manager = new RecipeManager(dir);
    const recipe = manager.applyRecipe('legacy', { numTracks: 5, targetArtist: 'Band' });

    expect(recipe).toEqual({
      format: 'legacy',
      filename: 'legacy.json',
      name: 'legacy.json',
      version: '1.0',
      description: 'Legacy recipe',
      systemPrompt: 'You are a professional music curator. Always respond with valid JSON only.',
      instructions: 'Pick 5 by Band from {tracks_data}',
      temperature: 0.4,
      maxTokens: 1000,
      strategyNotes: {}
    });
  });

  it('uses the reasoning template when reasoning is requested', () => {
    const manager = new RecipeManager(dir);
    const recipe = manager.applyRecipe('legacy', { numTracks: 5, targetArtist: 'Band' }, true);
    expect(recipe.instructions).toBe('Pick 5 by Band from {tracks_data} and explain');
  });

  it('reports missing legacy inputs', () => {
    const manager = new RecipeManager(dir);
    expect(() => manager.applyRecipe('legacy', { numTracks: 5 })).toThrow(
      'Missing required inputs for legacy.json: artist_name'
    );
  });

  it('refuses recipes without a prompt', () => {
    const manager = new RecipeManager(dir);
    expect(() => manager.applyRecipe('nollm', { numTracks: 5 })).toThrow('Recipe nollm.json does not use an LLM');
  });

  it('applies default llm settings and leaves failed math in place', () => {
    const manager = new RecipeManager(dir);
    const recipe = manager.applyRecipe('mathfail', { numTracks: 8 });

    expect(recipe.instructions).toBe('Pick {{MATH:DESIRED_TRACK_COUNT / 0}} of 8 tracks');
    expect(recipe.temperature).toBe(0.7);
    expect(recipe.maxTokens).toBe(1500);
    expect(recipe.strategyNotes).toEqual({});
  });

  it('reports unreadable recipes in the listing', () => {
    const manager = new RecipeManager(dir);
    const summaries = manager.listAvailableRecipes();

    expect(summaries.nollm).toMatchObject({ format: 'legacy', usesLlm: false });
    expect(summaries.missing).toEqual({
      filename: 'gone.json',
      error: `recipe file not found: ${join(dir, 'gone.json')}`
    });
    expect(summaries.broken.error?.startsWith(`Invalid JSON in recipe file ${join(dir, 'broken.json')}`)).toBe(true);
  });

  it('validates recipe structure', () => {
    write('bad.json', {
      description: 'Bad',
      inputs: 'num_tracks',
      prompt_template: 'Use {mood} and {num_tracks}',
      llm_params: { temperature: 5 }
    });
    const manager = new RecipeManager(dir);

    expect(manager.validateRecipe('bad.json')).toEqual([
      'Missing required field: version',
      'Missing required field: strategy_notes',
      "'inputs' must be a list",
      "Placeholder 'mood' in prompt_template not found in inputs",
      "'temperature' must be a number between 0 and 2"
    ]);
    expect(manager.validateRecipe('legacy.json')).toEqual([]);
    expect(manager.validateRecipe('gone.json')).toEqual([
      `Failed to load recipe: recipe file not found: ${join(dir, 'gone.json')}`
    ]);
  });

  it('requires an llm_config or prompt_template', () => {
    write('empty.json', { version: '1', description: 'x', inputs: [], strategy_notes: {} });
    const manager = new RecipeManager(dir);
    expect(manager.validateRecipe('empty.json')).toEqual(['Recipe must define llm_config or prompt_template']);
  });

  it('caches recipes until the cache is cleared', () => {
    const manager = new RecipeManager(dir);
    expect(manager.applyRecipe('legacy', { numTracks: 1, targetArtist: 'Band' }).temperature).toBe(0.4);

    write('legacy.json', {
      version: '1.1',
      description: 'Legacy recipe',
      inputs: ['num_tracks', 'artist_name'],
      prompt_template: 'Pick {num_tracks} by {artist_name} from {tracks_data}',
      llm_params: { temperature: 0.9 },
      strategy_notes: {}
    });
    expect(manager.applyRecipe('legacy', { numTracks: 1, targetArtist: 'Band' }).temperature).toBe(0.4);

    manager.clearCache();
    expect(manager.applyRecipe('legacy', { numTracks: 1, targetArtist: 'Band' }).temperature).toBe(0.9);
  });
});
