import type { Language } from '../../languages/detector.js';

const PYTHON_CRITERIA = `## Python Review Checklist

### Correctness
- Attribute or method access on values that may be None
- Mutable default arguments (def handler(items=[]))
- Bare or overly broad except clauses
- Dict lookups that can raise KeyError where .get() was intended
- Identity (is) used where equality (==) was meant

### Engineering Quality
- Public functions without type hints
- ORM queries issued inside loops (N+1)
- List endpoints or queries without pagination
- Blocking I/O inside async functions
- Unvalidated input reaching business logic

### Production Readiness
- Credentials or API keys in source
- Important operations with no logging
- HTTP calls without a timeout
- Environment variables read without a default or validation
- External service calls without error handling`;

const DOTNET_CRITERIA = `## .NET (C#) Review Checklist

### Correctness
- Possible NullReferenceException from missing null checks
- async void methods or un-awaited tasks
- IDisposable instances not wrapped in using
- String comparisons without an explicit StringComparison
- Collections modified while being enumerated

### Engineering Quality
- Entity Framework queries missing .Include() (N+1)
- IQueryable results returned without pagination
- Synchronous database calls where async APIs exist
- Missing model or argument validation
- Logging without ILogger<T>

### Production Readiness
- Secrets committed in appsettings.json
- HttpClient without a configured timeout
- Hardcoded configuration values
- Unstructured log messages
- catch (Exception) where a specific type is expected`;

const JAVASCRIPT_CRITERIA = `## JavaScript / TypeScript Review Checklist

### Correctness
- Property access on values that may be null or undefined
- Promise rejections that are never handled
- Loose equality (==) where strict equality is required
- Races between async state updates
- Lost this binding in callbacks

### Engineering Quality
- Request payloads used without validation
- Database queries inside loops (N+1)
- List endpoints without pagination parameters
- TypeScript strict mode disabled or bypassed with any
- Array operations over unbounded input

### Production Readiness
- console.log in place of the project logger
- Hardcoded API keys or secrets
- Configuration not read from process.env
- fetch calls without a timeout or AbortSignal
- React trees without error boundaries`;

const LANGUAGE_CRITERIA: Record<Language, string> = {
  python: PYTHON_CRITERIA,
  dotnet: DOTNET_CRITERIA,
  javascript: JAVASCRIPT_CRITERIA,
  typescript: JAVASCRIPT_CRITERIA,
};

export const GENERAL_CRITERIA =
  'No language-specific checklist applies. Apply general code review best practices.';

export function getLanguageCriteria(language: Language): string {
  return LANGUAGE_CRITERIA[language];
}

export function getCombinedCriteria(languages: readonly Language[]): string {
  // JavaScript and TypeScript share a checklist; include it once.
  const parts = [...new Set(languages.map(getLanguageCriteria))];
  return parts.length > 0 ? parts.join('\n\n---\n\n') : GENERAL_CRITERIA;
}
