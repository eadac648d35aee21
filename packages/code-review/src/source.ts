export type FunctionKind = 'def' | 'function';

export interface FunctionInfo {
  name: string;
  kind: FunctionKind;
  line_start: number;
  args: string[];
  body_lines: number;
}

const DEF_HEADER = /^(\s*)(?:async\s+)?def\s+([A-Za-z_]\w*)\s*\(([^)]*)\)[^:]*:/;
const FUNCTION_HEADER = /^(\s*)(?:export\s+)?(?:async\s+)?function\s*\*?\s*([A-Za-z_$][\w$]*)\s*\(([^)]*)\)/;

export function splitLines(code: string): string[] {
  return code.split(/\r?\n/);
}

function indentOf(line: string): number {
  return line.length - line.trimStart().length;
}

function parseArgs(raw: string): string[] {
  return raw
    .split(',')
    .map((arg) => arg.trim())
    .filter((arg) => arg !== '' && arg !== '*' && arg !== '/')
    .map((arg) => arg.replace(/^\*{1,2}/, '').split(/[:=]/)[0].trim());
}

/** Indentation-delimited body of a `def`: the following lines indented deeper. */
function defBodyRange(lines: string[], headerIndex: number): [number, number] {
  const headerIndent = indentOf(lines[headerIndex]);
  let end = headerIndex + 1;
  let lastCode = headerIndex;
  while (end < lines.length) {
    const line = lines[end];
    if (line.trim() !== '') {
      if (indentOf(line) <= headerIndent) {
        break;
      }
      lastCode = end;
    }
    end++;
  }
  return [headerIndex + 1, lastCode + 1];
}

/** Brace-delimited body of a `function`, starting at its first `{`. */
function braceBodyRange(lines: string[], headerIndex: number): [number, number] {
  let depth = 0;
  let opened = false;
  for (let i = headerIndex; i < lines.length; i++) {
    for (const char of lines[i]) {
      if (char === '{') {
        depth++;
        opened = true;
      } else if (char === '}') {
        depth--;
      }
    }
    if (opened && depth <= 0) {
      return [headerIndex + 1, i];
    }
  }
  return [headerIndex + 1, lines.length];
}

export function bodyRange(lines: string[], fn: Pick<FunctionInfo, 'kind' | 'line_start'>): [number, number] {
  const headerIndex = fn.line_start - 1;
  return fn.kind === 'def' ? defBodyRange(lines, headerIndex) : braceBodyRange(lines, headerIndex);
}

export function findFunctions(code: string): FunctionInfo[] {
  const lines = splitLines(code);
  const functions: FunctionInfo[] = [];

  lines.forEach((line, index) => {
    const def = DEF_HEADER.exec(line);
    const match = def ?? FUNCTION_HEADER.exec(line);
    if (!match) {
      return;
    }

    const kind: FunctionKind = def ? 'def' : 'function';
    const [start, end] = bodyRange(lines, { kind, line_start: index + 1 });
    const bodyLines = lines.slice(start, end).filter((body) => body.trim() !== '').length;

    functions.push({
      name: match[2],
      kind,
      line_start: index + 1,
      args: parseArgs(match[3]),
      body_lines: bodyLines,
    });
  });

  return functions;
}
