export type Language = 'python' | 'dotnet' | 'javascript' | 'typescript';

const EXTENSION_LANGUAGES: Record<string, Language> = {
  '.py': 'python',
  '.pyi': 'python',
  '.cs': 'dotnet',
  '.csx': 'dotnet',
  '.csproj': 'dotnet',
  '.sln': 'dotnet',
  '.js': 'javascript',
  '.mjs': 'javascript',
  '.cjs': 'javascript',
  '.jsx': 'javascript',
  '.ts': 'typescript',
  '.tsx': 'typescript',
  '.mts': 'typescript',
  '.cts': 'typescript',
};

// Matched as substrings of the lowercased path.
const EXCLUDED_PATTERNS = [
  // CI configuration
  '.github/',
  '.gitlab-ci',
  // Config files
  '.yml',
  '.yaml',
  '.json',
  '.toml',
  '.ini',
  '.cfg',
  '.conf',
  // Documentation
  '.md',
  '.rst',
  '.txt',
  // Lock files
  'package-lock.json',
  'yarn.lock',
  'poetry.lock',
  'pipfile.lock',
  // Build artifacts
  '.min.js',
  '.bundle.js',
  '.map',
  // Fixtures and test data
  'fixtures/',
  'testdata/',
  '__snapshots__/',
];

const DISPLAY_NAMES: Record<Language, string> = {
  python: 'Python',
  dotnet: '.NET (C#)',
  javascript: 'JavaScript',
  typescript: 'TypeScript',
};

function extensionOf(filename: string): string {
  const base = filename.slice(filename.lastIndexOf('/') + 1);
  const dot = base.lastIndexOf('.');
  // Dotfiles such as `.gitignore` have no extension.
  return dot > 0 ? base.slice(dot).toLowerCase() : '';
}

export function detectLanguage(filename: string): Language | null {
  return EXTENSION_LANGUAGES[extensionOf(filename)] ?? null;
}

export function shouldReviewFile(filename: string): boolean {
  const lower = filename.toLowerCase();
  if (EXCLUDED_PATTERNS.some(pattern => lower.includes(pattern))) {
    return false;
  }
  return detectLanguage(filename) !== null;
}

export function filterReviewableFiles(filenames: readonly string[]): string[] {
  return filenames.filter(shouldReviewFile);
}

export function detectLanguages(filenames: readonly string[]): Language[] {
  const found = new Set<Language>();
  for (const filename of filterReviewableFiles(filenames)) {
    const language = detectLanguage(filename);
    if (language) {
      found.add(language);
    }
  }
  return [...found].sort();
}

export function isLanguage(value: string): value is Language {
  return Object.prototype.hasOwnProperty.call(DISPLAY_NAMES, value);
}

export function getLanguageDisplayName(language: string): string {
  if (isLanguage(language)) {
    return DISPLAY_NAMES[language];
  }
  return language.charAt(0).toUpperCase() + language.slice(1).toLowerCase();
}
