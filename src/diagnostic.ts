/**
 * Health checks for troubleshooting a MagicLists installation
 */

import { createLlmProvider, type LlmSettings } from './ai/provider.js';
import type { LibraryProvider } from './navidrome/types.js';
import type { RecipeManager } from './recipes/recipe-manager.js';

export type CheckStatus = 'ok' | 'warn' | 'fail';

export interface DiagnosticCheck {
  name: string;
  status: CheckStatus;
  detail: string;
}

export interface DiagnosticDependencies {
  library: LibraryProvider;
  recipes: Pick<RecipeManager, 'listAvailableRecipes' | 'validateRecipe'>;
  llm: LlmSettings;
  now?: Date;
}

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

const checkLibrary = async (library: LibraryProvider, now: Date): Promise<DiagnosticCheck[]> => {
  let artistCount: number;
  try {
    artistCount = (await library.getArtists()).length;
  } catch (error) {
    return [{ name: 'navidrome', status: 'fail', detail: errorMessage(error) }];
  }

  const checks: DiagnosticCheck[] = [
    {
      name: 'navidrome',
      status: artistCount > 0 ? 'ok' : 'warn',
      detail: artistCount > 0 ? `${artistCount} artists in library` : 'library has no artists'
    }
  ];

  try {
    const since = new Date(now.getTime() - 30 * 24 * 60 * 60 * 1000);
    const scrobbles = await library.getScrobbles(since, 1);
    checks.push(
      scrobbles === null
        ? { name: 'scrobbles', status: 'warn', detail: 'scrobble history unavailable, play counts will be used' }
        : { name: 'scrobbles', status: 'ok', detail: 'scrobble history available' }
    );
  } catch (error) {
    checks.push({ name: 'scrobbles', status: 'warn', detail: errorMessage(error) });
  }

  return checks;
};

const checkRecipes = (recipes: DiagnosticDependencies['recipes']): DiagnosticCheck[] => {
  let summaries: ReturnType<RecipeManager['listAvailableRecipes']>;
  try {
    summaries = recipes.listAvailableRecipes();
  } catch (error) {
    return [{ name: 'recipes', status: 'fail', detail: errorMessage(error) }];
  }

  return Object.entries(summaries).map(([playlistType, summary]): DiagnosticCheck => {
    const problems = summary.error ? [summary.error] : recipes.validateRecipe(summary.filename);
    return problems.length === 0
      ? { name: `recipe:${playlistType}`, status: 'ok', detail: `${summary.filename} v${summary.version ?? '?'}` }
      : { name: `recipe:${playlistType}`, status: 'fail', detail: problems.join('; ') };
  });
};

/**
 * Run every check; never throws.
 */
export const runDiagnostic = async (deps: DiagnosticDependencies): Promise<DiagnosticCheck[]> => {
  const now = deps.now ?? new Date();
  const provider = createLlmProvider(deps.llm);
  const aiCheck: DiagnosticCheck = provider.ok
    ? { name: 'ai', status: 'ok', detail: `using ${provider.value.name}` }
    : { name: 'ai', status: 'warn', detail: `${provider.error.message}; algorithmic selection will be used` };

  return [...(await checkLibrary(deps.library, now)), aiCheck, ...checkRecipes(deps.recipes)];
};

const STATUS_ICON: Record<CheckStatus, string> = { ok: '✓', warn: '⚠️ ', fail: '❌' };

export const formatDiagnostic = (checks: readonly DiagnosticCheck[]): string =>
  checks.map(check => `${STATUS_ICON[check.status]} ${check.name}: ${check.detail}`).join('\n');
