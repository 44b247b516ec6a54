import { minimatch } from 'minimatch';

/** Characters per token used by the provider-agnostic estimate. */
export const CHARS_PER_TOKEN = 4;

/**
 * Monotonic token estimate. Exact counts are provider specific and only the
 * gateway's final bound needs to be conservative.
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

/**
 * Check if a file should be skipped based on the exclusion globs
 */
export function shouldSkipFile(filePath: string, skipPatterns: string[]): boolean {
  return skipPatterns.some((pattern) => minimatch(filePath, pattern, { dot: true, matchBase: !pattern.includes('/') }));
}

/**
 * Get language from file path
 */
export function getLanguageFromPath(filePath: string): string {
  const ext = filePath.split('.').pop()?.toLowerCase();
  const langMap: Record<string, string> = {
    js: 'javascript',
    jsx: 'javascript',
    mjs: 'javascript',
    cjs: 'javascript',
    ts: 'typescript',
    tsx: 'typescript',
    py: 'python',
    java: 'java',
    kt: 'kotlin',
    swift: 'swift',
    go: 'go',
    rs: 'rust',
    cpp: 'cpp',
    c: 'c',
    cs: 'csharp',
    php: 'php',
    rb: 'ruby',
  };
  return langMap[ext || ''] || 'text';
}
