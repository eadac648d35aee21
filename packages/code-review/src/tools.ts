import type { Tool, ToolContext, ToolRegistry } from '@graphrun/graph-engine';
import { createLogger } from '@graphrun/shared';
import type { RunState } from '@graphrun/shared';
import { bodyRange, findFunctions, splitLines } from './source';
import type { FunctionInfo } from './source';

const logger = createLogger({ name: 'code-review-tools' });

export interface ComplexityScore {
  function: string;
  complexity: number;
}

export type IssueType = 'long_line' | 'multiple_statements' | 'missing_docstring' | 'high_complexity';

export interface Issue {
  type: IssueType;
  message: string;
  line?: number;
  function?: string;
}

export interface Suggestion {
  category: 'formatting' | 'documentation' | 'refactoring';
  suggestion: string;
  priority: 'low' | 'medium' | 'high';
}

export const DEFAULT_MAX_LINE_LENGTH = 100;
export const DEFAULT_COMPLEXITY_THRESHOLD = 10;

const DECISION_POINT = /\b(?:if|elif|for|while|except|catch|case)\b/g;

function codeOf(state: RunState): string {
  return typeof state.code === 'string' ? state.code : '';
}

function numberParam(context: ToolContext, name: string, fallback: number): number {
  const value = context.params[name];
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function numberOf(state: RunState, key: string, fallback: number): number {
  const value = state[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function isFunctionInfo(value: unknown): value is FunctionInfo {
  return (
    typeof value === 'object' &&
    value !== null &&
    'name' in value &&
    typeof value.name === 'string' &&
    'line_start' in value &&
    typeof value.line_start === 'number' &&
    'kind' in value &&
    (value.kind === 'def' || value.kind === 'function')
  );
}

function isComplexityScore(value: unknown): value is ComplexityScore {
  return (
    typeof value === 'object' &&
    value !== null &&
    'function' in value &&
    typeof value.function === 'string' &&
    'complexity' in value &&
    typeof value.complexity === 'number'
  );
}

function isIssue(value: unknown): value is Issue {
  return typeof value === 'object' && value !== null && 'type' in value && typeof value.type === 'string';
}

function listOf<T>(state: RunState, key: string, guard: (value: unknown) => value is T): T[] {
  const value = state[key];
  return Array.isArray(value) ? value.filter(guard) : [];
}

function isComment(line: string): boolean {
  const trimmed = line.trimStart();
  return trimmed.startsWith('#') || trimmed.startsWith('//');
}

export const extractFunctions: Tool = (state) => {
  const functions = findFunctions(codeOf(state));
  logger.debug({ count: functions.length }, 'Extracted functions');
  return { ...state, functions, function_count: functions.length };
};

/** Cyclomatic estimate per function: one plus its decision points. */
export const checkComplexity: Tool = (state) => {
  const lines = splitLines(codeOf(state));
  const functions = listOf(state, 'functions', isFunctionInfo);

  const complexityScores: ComplexityScore[] = functions.map((fn) => {
    const [start, end] = bodyRange(lines, fn);
    const decisions = lines
      .slice(start, end)
      .filter((line) => !isComment(line))
      .reduce((count, line) => count + (line.match(DECISION_POINT)?.length ?? 0), 0);
    return { function: fn.name, complexity: 1 + decisions };
  });

  const total = complexityScores.reduce((sum, score) => sum + score.complexity, 0);
  return {
    ...state,
    complexity_scores: complexityScores,
    avg_complexity: complexityScores.length > 0 ? total / complexityScores.length : 0,
  };
};

export const detectIssues: Tool = (state, context) => {
  const maxLineLength = numberParam(context, 'max_line_length', DEFAULT_MAX_LINE_LENGTH);
  const complexityThreshold = numberParam(context, 'complexity_threshold', DEFAULT_COMPLEXITY_THRESHOLD);
  const lines = splitLines(codeOf(state));
  const issues: Issue[] = [];

  lines.forEach((line, index) => {
    const lineNumber = index + 1;

    if (line.length > maxLineLength) {
      issues.push({
        line: lineNumber,
        type: 'long_line',
        message: `Line exceeds ${maxLineLength} characters (${line.length} chars)`,
      });
    }

    if (!isComment(line) && /;\s*\S/.test(line)) {
      issues.push({
        line: lineNumber,
        type: 'multiple_statements',
        message: 'Multiple statements on one line',
      });
    }
  });

  for (const fn of findFunctions(codeOf(state))) {
    const documented =
      fn.kind === 'def'
        ? /^\s*("""|''')/.test(lines[fn.line_start] ?? '')
        : /\*\/\s*$/.test(lines[fn.line_start - 2] ?? '');
    if (!documented) {
      issues.push({
        line: fn.line_start,
        type: 'missing_docstring',
        message: `Function '${fn.name}' missing docstring`,
      });
    }
  }

  for (const score of listOf(state, 'complexity_scores', isComplexityScore)) {
    if (score.complexity > complexityThreshold) {
      issues.push({
        type: 'high_complexity',
        function: score.function,
        message: `High complexity: ${score.complexity}`,
      });
    }
  }

  return { ...state, issues, issue_count: issues.length };
};

const SUGGESTIONS: Array<{ issue: IssueType; suggestion: Suggestion }> = [
  {
    issue: 'long_line',
    suggestion: {
      category: 'formatting',
      suggestion: 'Break long lines into multiple lines for better readability',
      priority: 'medium',
    },
  },
  {
    issue: 'missing_docstring',
    suggestion: {
      category: 'documentation',
      suggestion: 'Add docstrings to all functions explaining their purpose',
      priority: 'high',
    },
  },
  {
    issue: 'high_complexity',
    suggestion: {
      category: 'refactoring',
      suggestion: 'Refactor complex functions into smaller, more manageable pieces',
      priority: 'high',
    },
  },
  {
    issue: 'multiple_statements',
    suggestion: {
      category: 'formatting',
      suggestion: 'Use separate lines for each statement',
      priority: 'low',
    },
  },
];

export const suggestImprovements: Tool = (state) => {
  const present = new Set(listOf(state, 'issues', isIssue).map((issue) => issue.type));
  const suggestions = SUGGESTIONS.filter(({ issue }) => present.has(issue)).map(
    ({ suggestion }) => suggestion
  );
  return { ...state, suggestions, suggestion_count: suggestions.length };
};

/**
 * Score out of 10: half a point per issue (at most 5), minus 1 or 2 for
 * average complexity above 5 or 10. Also counts review passes in `iteration`.
 */
export const checkQualityScore: Tool = (state) => {
  const issueCount = numberOf(state, 'issue_count', 0);
  const avgComplexity = numberOf(state, 'avg_complexity', 0);

  let score = 10 - Math.min(issueCount * 0.5, 5);
  if (avgComplexity > 10) {
    score -= 2;
  } else if (avgComplexity > 5) {
    score -= 1;
  }

  return {
    ...state,
    quality_score: Math.max(0, Math.min(10, score)),
    iteration: numberOf(state, 'iteration', 0) + 1,
  };
};

export function registerCodeReviewTools(registry: ToolRegistry): ToolRegistry {
  return registry
    .register('extract_functions', extractFunctions, {
      description: 'Find function definitions in `code`',
    })
    .register('check_complexity', checkComplexity, {
      description: 'Estimate cyclomatic complexity per function',
    })
    .register('detect_issues', detectIssues, {
      description: 'Flag long lines, multiple statements, missing docs and complex functions',
    })
    .register('suggest_improvements', suggestImprovements, {
      description: 'Turn detected issues into suggestions',
    })
    .register('check_quality_score', checkQualityScore, {
      description: 'Score the code from 0 to 10',
    });
}
