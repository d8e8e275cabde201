/**
 * Error formatting utilities for job-run records and CLI output
 */

import { CurationError } from '../curation/errors.js';

interface FormattedError {
  message: string;
  suggestion?: string;
  technical?: string;
}

/**
 * Format error for user display with context and suggestions
 */
export function formatUserError(error: unknown, context: string): string {
  const formatted = parseError(error, context);

  let message = formatted.message;

  if (formatted.suggestion) {
    message += ` | Suggestion: ${formatted.suggestion}`;
  }

  if (formatted.technical) {
    message += ` | Technical: ${formatted.technical}`;
  }

  return message;
}

function parseError(error: unknown, context: string): FormattedError {
  if (error instanceof CurationError) {
    return {
      message: error.message,
      suggestion: error.kind === 'insufficient-history'
        ? 'Play some music in Navidrome and try again once scrobbles are recorded.'
        : 'Listen to a wider range of tracks, or lower the track count.'
    };
  }

  const errorStr = error instanceof Error ? error.message : String(error);

  if (/timeout|TimeoutError|ETIMEDOUT/.test(errorStr)) {
    return {
      message: `Navidrome server timed out while ${context}`,
      suggestion: 'Check if Navidrome is busy scanning the library. Raise NAVIDROME_TIMEOUT or try again in a few minutes.',
      technical: extractTechnicalDetails(errorStr)
    };
  }

  if (errorStr.includes('ECONNREFUSED')) {
    return {
      message: `Cannot connect to Navidrome while ${context}`,
      suggestion: 'Check if Navidrome is running and NAVIDROME_URL is correct.',
      technical: extractUrl(errorStr)
    };
  }

  if (errorStr.includes('ENOTFOUND') || errorStr.includes('getaddrinfo')) {
    return {
      message: `DNS lookup failed while ${context}`,
      suggestion: 'Check the NAVIDROME_URL hostname.',
      technical: extractUrl(errorStr)
    };
  }

  if (/Invalid username or password|Access forbidden|\b401\b|\b403\b/.test(errorStr)) {
    return {
      message: `Authentication failed while ${context}`,
      suggestion: 'Check NAVIDROME_USERNAME and NAVIDROME_PASSWORD.',
      technical: extractTechnicalDetails(errorStr)
    };
  }

  if (errorStr.includes('Subsonic API error')) {
    return {
      message: `Navidrome rejected a request while ${context}`,
      suggestion: 'The artist or playlist may have been removed. Check NAVIDROME_LIBRARY_ID if you run several libraries.',
      technical: extractTechnicalDetails(errorStr)
    };
  }

  if (errorStr.includes('recipe') || errorStr.includes('Recipe')) {
    return {
      message: `Recipe problem while ${context}`,
      suggestion: 'Check RECIPES_DIR and run `magiclists recipes` to validate the recipe files.',
      technical: extractTechnicalDetails(errorStr)
    };
  }

  if (errorStr.includes('SQLITE') || errorStr.includes('database')) {
    return {
      message: `Database error while ${context}`,
      suggestion: 'Check database file permissions and disk space.',
      technical: extractTechnicalDetails(errorStr)
    };
  }

  return {
    message: `Error ${context}: ${shortenMessage(errorStr)}`,
    suggestion: 'Check logs for details.',
    technical: extractTechnicalDetails(errorStr)
  };
}

function extractUrl(errorStr: string): string | undefined {
  const urlMatch = errorStr.match(/https?:\/\/[^\s"]+/);
  if (!urlMatch) {
    return undefined;
  }
  // Query strings carry Subsonic credentials
  return urlMatch[0].split('?')[0];
}

/**
 * First line only, shortened
 */
function extractTechnicalDetails(errorStr: string): string {
  return shortenMessage(errorStr.split('\n')[0]);
}

function shortenMessage(msg: string): string {
  const maxLength = 150;
  if (msg.length <= maxLength) {
    return msg;
  }
  return msg.substring(0, maxLength) + '...';
}
