/**
 * Configuration options for the fieldmend repair engine
 *
 * All options are optional with conservative defaults; resolveOptions()
 * fills the gaps and rejects inconsistent combinations.
 */

import { ConfigurationError } from './errors.js';

/**
 * Lexical rules used by the scanner and the decomposer
 */
export interface LexerOptions {
  /** Characters that open and close string literals (default: ['"']) */
  quotes?: string[];
  /** Skip single-quoted character literals such as '{' (default: true) */
  charLiterals?: boolean;
  /** Lex raw strings r"..." and r#"..."# without escapes (default: true) */
  rawStrings?: boolean;
  /** Recognise line (//) and block comments (default: true) */
  comments?: boolean;
}

export interface RepairOptions {
  /** Indentation added per nesting level when a literal is rewritten (default: 4 spaces) */
  indentUnit?: string;
  /** File extensions selected in a directory target (default: ['.rs']) */
  extensions?: string[];
  /** Directory names never descended into (default: node_modules, target, .git, dist) */
  ignoreDirs?: string[];
  /** Words that mark a tag as a declaration rather than a construction */
  declarationKeywords?: string[];
  /** Report changes without writing files (default: false) */
  dryRun?: boolean;
  lexer?: LexerOptions;
}

export type ResolvedLexerOptions = Required<LexerOptions>;

export interface ResolvedOptions
  extends Required<Omit<RepairOptions, 'lexer'>> {
  lexer: ResolvedLexerOptions;
}

export const DEFAULT_DECLARATION_KEYWORDS = [
  'struct',
  'enum',
  'union',
  'impl',
  'for',
  'trait',
  'type',
  'class',
  'interface',
] as const;

export const DEFAULT_OPTIONS: ResolvedOptions = {
  indentUnit: '    ',
  extensions: ['.rs'],
  ignoreDirs: ['node_modules', 'target', '.git', 'dist'],
  declarationKeywords: [...DEFAULT_DECLARATION_KEYWORDS],
  dryRun: false,

  lexer: {
    quotes: ['"'],
    charLiterals: true,
    rawStrings: true,
    comments: true,
  },
};

/**
 * Resolve user options against defaults
 *
 * @throws ConfigurationError when a combination cannot work
 */
export function resolveOptions(
  userOptions: RepairOptions = {}
): ResolvedOptions {
  const resolved: ResolvedOptions = {
    ...DEFAULT_OPTIONS,
    ...stripUndefined(userOptions),

    // Deep merge nested objects
    lexer: {
      ...DEFAULT_OPTIONS.lexer,
      ...stripUndefined(userOptions.lexer ?? {}),
    },
  };

  resolved.extensions = resolved.extensions.map((ext) => ext.toLowerCase());

  validateOptions(resolved);
  return resolved;
}

function stripUndefined<T extends object>(value: T): Partial<T> {
  const out: Partial<T> = {};
  for (const key of Object.keys(value) as Array<keyof T>) {
    if (value[key] !== undefined) {
      out[key] = value[key];
    }
  }
  return out;
}

function validateOptions(options: ResolvedOptions): void {
  if (!/^[ \t]+$/.test(options.indentUnit)) {
    throw new ConfigurationError(
      'indentUnit must be a non-empty run of spaces or tabs',
      { valueExcerpt: JSON.stringify(options.indentUnit) }
    );
  }
  if (options.extensions.length === 0) {
    throw new ConfigurationError('extensions must not be empty');
  }
  const badExt = options.extensions.find((ext) => !/^\.[\w.-]+$/.test(ext));
  if (badExt !== undefined) {
    throw new ConfigurationError(
      `extension "${badExt}" must start with "." (e.g. ".rs")`
    );
  }
  if (options.lexer.quotes.length === 0) {
    throw new ConfigurationError('lexer.quotes must not be empty');
  }
  const badQuote = options.lexer.quotes.find(
    (quote) => quote.length !== 1 || quote === '\\'
  );
  if (badQuote !== undefined) {
    throw new ConfigurationError(
      `lexer.quotes entries must be single non-backslash characters (got ${JSON.stringify(badQuote)})`
    );
  }
  if (options.lexer.rawStrings && !options.lexer.quotes.includes('"')) {
    throw new ConfigurationError(
      'lexer.rawStrings needs " among lexer.quotes'
    );
  }
  if (options.lexer.charLiterals && options.lexer.quotes.includes("'")) {
    throw new ConfigurationError(
      "lexer.charLiterals cannot be combined with ' as a string quote"
    );
  }
}
