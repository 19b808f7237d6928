/**
 * A small, sandboxed template language for error messages.
 *
 * Syntax follows the familiar double-brace action style, limited to what
 * error templates need:
 *
 * - `{{.Field}}`, `{{.A.B}}`, `{{.}}`, `{{$}}`, `{{$var}}`, `{{$var.Field}}`
 * - `{{if p}}...{{else if p}}...{{else}}...{{end}}`
 * - `{{range p}}...{{else}}...{{end}}`, `{{range $i, $e := p}}`, `{{range $e := p}}`
 * - calls to `add`, `len` and `json`, e.g. `{{add $i 1}}`
 * - string and number literals
 * - trim markers `{{- ` and ` -}}`, comments `{{/* ... *\/}}`
 *
 * Templates can read the data they are given and call those three
 * functions. Nothing else is reachable.
 *
 * @packageDocumentation
 */

import { TemplateError } from '../errors.js';

type Operand =
  | { readonly kind: 'field'; readonly path: string[] }
  | { readonly kind: 'variable'; readonly name: string; readonly path: string[] }
  | { readonly kind: 'literal'; readonly value: string | number };

type Command =
  | { readonly kind: 'value'; readonly operand: Operand }
  | { readonly kind: 'call'; readonly name: FunctionName; readonly args: Operand[] };

type TemplateNode =
  | { readonly kind: 'text'; readonly text: string }
  | { readonly kind: 'action'; readonly line: number; readonly command: Command }
  | {
      readonly kind: 'if';
      readonly line: number;
      readonly command: Command;
      readonly list: TemplateNode[];
      readonly elseList: TemplateNode[] | undefined;
    }
  | {
      readonly kind: 'range';
      readonly line: number;
      /** Variables bound per element: `[$e]` or `[$i, $e]`. */
      readonly declarations: string[];
      readonly command: Command;
      readonly list: TemplateNode[];
      readonly elseList: TemplateNode[] | undefined;
    };

type RangeNode = Extract<TemplateNode, { kind: 'range' }>;

interface Token {
  readonly kind: 'field' | 'dot' | 'variable' | 'identifier' | 'literal' | 'declare' | 'comma';
  readonly text: string;
  readonly value?: string | number;
  /** True when no whitespace separates this token from the previous one. */
  readonly adjacent: boolean;
}

type Segment =
  | { readonly kind: 'text'; readonly text: string }
  | { readonly kind: 'action'; readonly line: number; readonly tokens: Token[] };

const SPACE = /[ \t\r\n]/;
const TRAILING_SPACE = /[ \t\r\n]+$/;
const LEADING_SPACE = /^[ \t\r\n]+/;
const NUMBER = /^-?\d+(?:\.\d+)?/;
const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*/;
const NAME_CHARS = /^[A-Za-z0-9_]*/;

function fail(line: number, message: string): never {
  throw new TemplateError(`template: line ${String(line)}: ${message}`);
}

function lineAt(source: string, offset: number): number {
  let line = 1;
  for (let i = 0; i < offset; i++) {
    if (source.charCodeAt(i) === 10) {
      line++;
    }
  }
  return line;
}

/**
 * Returns the offset just past a double-quoted string starting at `start`.
 */
function skipQuoted(source: string, start: number, line: number): number {
  let i = start + 1;
  while (i < source.length) {
    const ch = source.charAt(i);
    if (ch === '\\') {
      i += 2;
      continue;
    }
    if (ch === '"') {
      return i + 1;
    }
    if (ch === '\n') {
      break;
    }
    i++;
  }
  return fail(line, 'unterminated quoted string');
}

function tokenize(inner: string, line: number): Token[] {
  const tokens: Token[] = [];
  let i = 0;
  let adjacent = true;

  const push = (token: Omit<Token, 'adjacent'>, length: number): void => {
    tokens.push({ ...token, adjacent });
    adjacent = true;
    i += length;
  };

  while (i < inner.length) {
    const ch = inner.charAt(i);
    const rest = inner.slice(i);

    if (SPACE.test(ch)) {
      adjacent = false;
      i++;
    } else if (ch === ',') {
      push({ kind: 'comma', text: ch }, 1);
    } else if (rest.startsWith(':=')) {
      push({ kind: 'declare', text: ':=' }, 2);
    } else if (ch === '"') {
      const end = skipQuoted(inner, i, line);
      const raw = inner.slice(i, end);
      let value: unknown;
      try {
        value = JSON.parse(raw);
      } catch {
        return fail(line, `invalid string literal ${raw}`);
      }
      push({ kind: 'literal', text: raw, value: String(value) }, raw.length);
    } else if (ch === '.' && /[A-Za-z_]/.test(inner.charAt(i + 1))) {
      const name = (NAME_CHARS.exec(inner.slice(i + 1)) ?? [''])[0];
      push({ kind: 'field', text: name }, name.length + 1);
    } else if (ch === '.') {
      push({ kind: 'dot', text: ch }, 1);
    } else if (NUMBER.test(rest)) {
      const text = (NUMBER.exec(rest) ?? [''])[0];
      push({ kind: 'literal', text, value: Number(text) }, text.length);
    } else if (ch === '$') {
      const name = (NAME_CHARS.exec(inner.slice(i + 1)) ?? [''])[0];
      push({ kind: 'variable', text: `$${name}` }, name.length + 1);
    } else if (IDENTIFIER.test(rest)) {
      const name = (IDENTIFIER.exec(rest) ?? [''])[0];
      push({ kind: 'identifier', text: name }, name.length);
    } else {
      return fail(line, `unexpected "${ch}" in action`);
    }
  }

  return tokens;
}

/**
 * Splits source into text and action segments, applying trim markers and
 * dropping comments.
 */
function segment(source: string): Segment[] {
  const segments: Segment[] = [];
  let pos = 0;
  let trimNextText = false;

  const pushText = (text: string): void => {
    const trimmed = trimNextText ? text.replace(LEADING_SPACE, '') : text;
    trimNextText = false;
    if (trimmed !== '') {
      segments.push({ kind: 'text', text: trimmed });
    }
  };

  while (pos < source.length) {
    const open = source.indexOf('{{', pos);
    if (open === -1) {
      pushText(source.slice(pos));
      break;
    }

    const line = lineAt(source, open);
    let innerStart = open + 2;
    let text = source.slice(pos, open);

    if (source.charAt(innerStart) === '-' && SPACE.test(source.charAt(innerStart + 1))) {
      text = text.replace(TRAILING_SPACE, '');
      innerStart += 1;
    }
    pushText(text);

    let close = -1;
    let i = innerStart;
    while (i < source.length) {
      if (source.charAt(i) === '"') {
        i = skipQuoted(source, i, line);
        continue;
      }
      if (source.startsWith('/*', i)) {
        const end = source.indexOf('*/', i + 2);
        if (end === -1) {
          return fail(line, 'unclosed comment');
        }
        i = end + 2;
        continue;
      }
      if (source.startsWith('}}', i)) {
        close = i;
        break;
      }
      i++;
    }
    if (close === -1) {
      return fail(line, 'unclosed action');
    }

    let innerEnd = close;
    if (source.charAt(close - 1) === '-' && SPACE.test(source.charAt(close - 2)) && close - 1 > innerStart) {
      innerEnd = close - 1;
      trimNextText = true;
    }
    pos = close + 2;

    const inner = source.slice(innerStart, innerEnd).trim();
    if (inner.startsWith('/*')) {
      if (!inner.endsWith('*/')) {
        return fail(line, 'comment ends before closing delimiter');
      }
      continue;
    }
    if (inner === '') {
      return fail(line, 'missing value for command');
    }

    segments.push({ kind: 'action', line, tokens: tokenize(inner, line) });
  }

  return segments;
}

/**
 * Reads the tokens of one action.
 */
class ActionReader {
  private index = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly line: number
  ) {}

  peek(offset = 0): Token | undefined {
    return this.tokens[this.index + offset];
  }

  skip(count = 1): void {
    this.index += count;
  }

  expectEnd(context: string): void {
    const token = this.peek();
    if (token !== undefined) {
      fail(this.line, `unexpected "${token.text}" in ${context}`);
    }
  }

  /**
   * Reads `$e :=` or `$i, $e :=`, if present.
   */
  declarations(): string[] {
    const [first, second, third, fourth] = [this.peek(), this.peek(1), this.peek(2), this.peek(3)];
    if (first?.kind === 'variable' && second?.kind === 'declare') {
      this.skip(2);
      return [first.text];
    }
    if (first?.kind === 'variable' && second?.kind === 'comma') {
      if (third?.kind !== 'variable' || fourth?.kind !== 'declare') {
        return fail(this.line, 'expected "$index, $element :=" in range');
      }
      this.skip(4);
      return [first.text, third.text];
    }
    return [];
  }

  /**
   * Reads a value or a function call up to the end of the action.
   */
  command(context: string): Command {
    const head = this.peek();
    if (head === undefined) {
      return fail(this.line, `missing value for ${context}`);
    }

    let command: Command;
    if (head.kind === 'identifier') {
      const name = head.text;
      if (!isFunctionName(name)) {
        return fail(this.line, `function "${name}" not defined`);
      }
      this.skip();
      const args: Operand[] = [];
      while (this.peek() !== undefined) {
        args.push(this.operand());
      }
      command = { kind: 'call', name, args };
    } else {
      command = { kind: 'value', operand: this.operand() };
    }

    this.expectEnd(context);
    return command;
  }

  private fieldChain(): string[] {
    const path: string[] = [];
    for (let token = this.peek(); token?.kind === 'field' && token.adjacent; token = this.peek()) {
      path.push(token.text);
      this.skip();
    }
    return path;
  }

  private operand(): Operand {
    const token = this.peek();
    if (token === undefined) {
      return fail(this.line, 'unexpected end of action');
    }
    this.skip();
    switch (token.kind) {
      case 'field':
        return { kind: 'field', path: [token.text, ...this.fieldChain()] };
      case 'dot':
        return { kind: 'field', path: [] };
      case 'variable':
        return { kind: 'variable', name: token.text, path: this.fieldChain() };
      case 'literal':
        return { kind: 'literal', value: token.value ?? '' };
      default:
        return fail(this.line, `unexpected "${token.text}" in operand`);
    }
  }
}

type ListStop =
  | { readonly kind: 'eof' }
  | { readonly kind: 'end' }
  | { readonly kind: 'else'; readonly line: number; readonly elseIf: ActionReader | undefined };

/**
 * Builds the node tree from segments.
 */
class TreeParser {
  private index = 0;

  constructor(private readonly segments: Segment[]) {}

  parse(): TemplateNode[] {
    const { nodes, stop } = this.list();
    if (stop.kind === 'end') {
      fail(this.lastLine(), 'unexpected {{end}}');
    }
    if (stop.kind === 'else') {
      fail(stop.line, 'unexpected {{else}}');
    }
    return nodes;
  }

  private lastLine(): number {
    const previous = this.segments[this.index - 1];
    return previous?.kind === 'action' ? previous.line : 1;
  }

  private list(): { nodes: TemplateNode[]; stop: ListStop } {
    const nodes: TemplateNode[] = [];

    for (let current = this.segments[this.index]; current !== undefined; current = this.segments[this.index]) {
      this.index++;
      if (current.kind === 'text') {
        nodes.push({ kind: 'text', text: current.text });
        continue;
      }

      const reader = new ActionReader(current.tokens, current.line);
      const head = reader.peek();
      const keyword = head?.kind === 'identifier' ? head.text : undefined;

      switch (keyword) {
        case 'end':
          reader.skip();
          reader.expectEnd('{{end}}');
          return { nodes, stop: { kind: 'end' } };
        case 'else': {
          reader.skip();
          const next = reader.peek();
          if (next?.kind === 'identifier' && next.text === 'if') {
            reader.skip();
            return { nodes, stop: { kind: 'else', line: current.line, elseIf: reader } };
          }
          reader.expectEnd('{{else}}');
          return { nodes, stop: { kind: 'else', line: current.line, elseIf: undefined } };
        }
        case 'if':
          reader.skip();
          nodes.push(this.ifBody(reader, current.line));
          break;
        case 'range':
          reader.skip();
          nodes.push(this.rangeBody(reader, current.line));
          break;
        default:
          nodes.push({ kind: 'action', line: current.line, command: reader.command('command') });
      }
    }

    return { nodes, stop: { kind: 'eof' } };
  }

  private elseBranch(line: number): TemplateNode[] {
    const branch = this.list();
    if (branch.stop.kind !== 'end') {
      return fail(line, 'expected {{end}} after {{else}}');
    }
    return branch.nodes;
  }

  private ifBody(reader: ActionReader, line: number): TemplateNode {
    const command = reader.command('if');
    const { nodes, stop } = this.list();

    switch (stop.kind) {
      case 'eof':
        return fail(line, 'unexpected EOF: {{if}} has no matching {{end}}');
      case 'end':
        return { kind: 'if', line, command, list: nodes, elseList: undefined };
      case 'else': {
        const elseList = stop.elseIf === undefined ? this.elseBranch(line) : [this.ifBody(stop.elseIf, stop.line)];
        return { kind: 'if', line, command, list: nodes, elseList };
      }
    }
  }

  private rangeBody(reader: ActionReader, line: number): RangeNode {
    const declarations = reader.declarations();
    const command = reader.command('range');
    const { nodes, stop } = this.list();

    switch (stop.kind) {
      case 'eof':
        return fail(line, 'unexpected EOF: {{range}} has no matching {{end}}');
      case 'end':
        return { kind: 'range', line, declarations, command, list: nodes, elseList: undefined };
      case 'else':
        if (stop.elseIf !== undefined) {
          return fail(stop.line, '{{else if}} is not allowed in {{range}}');
        }
        return { kind: 'range', line, declarations, command, list: nodes, elseList: this.elseBranch(line) };
    }
  }
}

/**
 * Truthiness: false, 0, `null`, `undefined`, `""`, empty arrays and empty
 * objects are false.
 */
export function isTruthy(value: unknown): boolean {
  if (value === undefined || value === null) {
    return false;
  }
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return value !== 0;
  }
  if (typeof value === 'string') {
    return value !== '';
  }
  if (Array.isArray(value)) {
    return value.length > 0;
  }
  if (typeof value === 'object') {
    return Object.keys(value).length > 0;
  }
  return true;
}

function typeName(value: unknown): string {
  if (value === null) {
    return 'nil';
  }
  if (Array.isArray(value)) {
    return 'list';
  }
  return typeof value === 'object' ? 'map' : typeof value;
}

function compareKeys([a]: [string, unknown], [b]: [string, unknown]): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Formats a value for output. `undefined` prints as `<no value>` and
 * `null` as `<nil>`.
 */
export function formatValue(value: unknown): string {
  if (value === undefined) {
    return '<no value>';
  }
  if (value === null) {
    return '<nil>';
  }
  if (typeof value === 'string') {
    return value;
  }
  if (Array.isArray(value)) {
    return `[${value.map((item) => formatValue(item)).join(' ')}]`;
  }
  if (typeof value === 'object') {
    const entries = Object.entries(value).sort(compareKeys);
    return `map[${entries.map(([key, item]) => `${key}:${formatValue(item)}`).join(' ')}]`;
  }
  return String(value);
}

type FunctionName = 'add' | 'len' | 'json';

function isFunctionName(name: string): name is FunctionName {
  return name === 'add' || name === 'len' || name === 'json';
}

function expectArgs(name: FunctionName, args: unknown[], count: number): void {
  if (args.length !== count) {
    throw new TemplateError(`wrong number of args for ${name}: want ${String(count)} got ${String(args.length)}`);
  }
}

function callFunction(name: FunctionName, args: unknown[]): unknown {
  switch (name) {
    case 'add': {
      expectArgs(name, args, 2);
      const [a, b] = args;
      if (typeof a !== 'number' || typeof b !== 'number') {
        throw new TemplateError(`add: expected number, got ${typeName(typeof a === 'number' ? b : a)}`);
      }
      return a + b;
    }
    case 'len': {
      expectArgs(name, args, 1);
      const [value] = args;
      if (typeof value === 'string' || Array.isArray(value)) {
        return value.length;
      }
      if (typeof value === 'object' && value !== null) {
        return Object.keys(value).length;
      }
      throw new TemplateError(`len of type ${typeName(value)}`);
    }
    case 'json':
      expectArgs(name, args, 1);
      return JSON.stringify(args[0]) ?? 'null';
  }
}

interface Variable {
  readonly name: string;
  readonly value: unknown;
}

/**
 * Executes a parsed tree against data.
 */
class Executor {
  private readonly variables: Variable[];
  private readonly output: string[] = [];

  constructor(root: unknown) {
    this.variables = [{ name: '$', value: root }];
  }

  run(nodes: TemplateNode[], dot: unknown): string {
    this.list(nodes, dot);
    return this.output.join('');
  }

  private list(nodes: TemplateNode[], dot: unknown): void {
    for (const node of nodes) {
      this.node(node, dot);
    }
  }

  private node(node: TemplateNode, dot: unknown): void {
    switch (node.kind) {
      case 'text':
        this.output.push(node.text);
        return;
      case 'action':
        this.output.push(formatValue(this.command(node.command, dot, node.line)));
        return;
      case 'if':
        if (isTruthy(this.command(node.command, dot, node.line))) {
          this.list(node.list, dot);
        } else if (node.elseList !== undefined) {
          this.list(node.elseList, dot);
        }
        return;
      case 'range':
        this.range(node, dot);
        return;
    }
  }

  private range(node: RangeNode, dot: unknown): void {
    const collection = this.command(node.command, dot, node.line);

    let entries: Array<[unknown, unknown]>;
    if (collection === undefined || collection === null) {
      entries = [];
    } else if (Array.isArray(collection)) {
      entries = collection.map((item: unknown, index): [unknown, unknown] => [index, item]);
    } else if (typeof collection === 'object') {
      entries = Object.entries(collection).sort(compareKeys);
    } else {
      return fail(node.line, `range can't iterate over ${formatValue(collection)}`);
    }

    if (entries.length === 0) {
      if (node.elseList !== undefined) {
        this.list(node.elseList, dot);
      }
      return;
    }

    const [first, second] = node.declarations;
    for (const [key, element] of entries) {
      const mark = this.variables.length;
      if (first !== undefined && second !== undefined) {
        this.variables.push({ name: first, value: key }, { name: second, value: element });
      } else if (first !== undefined) {
        this.variables.push({ name: first, value: element });
      }
      this.list(node.list, element);
      this.variables.length = mark;
    }
  }

  private command(command: Command, dot: unknown, line: number): unknown {
    if (command.kind === 'value') {
      return this.operand(command.operand, dot, line);
    }
    const args = command.args.map((operand) => this.operand(operand, dot, line));
    try {
      return callFunction(command.name, args);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return fail(line, `error calling ${command.name}: ${message}`);
    }
  }

  private operand(operand: Operand, dot: unknown, line: number): unknown {
    switch (operand.kind) {
      case 'field':
        return this.resolve(dot, operand.path, '', line);
      case 'variable':
        return this.resolve(this.lookup(operand.name, line), operand.path, operand.name, line);
      case 'literal':
        return operand.value;
    }
  }

  private lookup(name: string, line: number): unknown {
    for (let i = this.variables.length - 1; i >= 0; i--) {
      const variable = this.variables[i];
      if (variable?.name === name) {
        return variable.value;
      }
    }
    return fail(line, `undefined variable "${name}"`);
  }

  private resolve(base: unknown, path: readonly string[], label: string, line: number): unknown {
    let current = base;
    let evaluated = label;
    for (const name of path) {
      if (current === undefined || current === null) {
        return fail(line, `nil pointer evaluating ${evaluated}.${name}`);
      }
      if (typeof current !== 'object' || Array.isArray(current) || !Object.prototype.hasOwnProperty.call(current, name)) {
        return fail(line, `can't evaluate field ${name} in type ${typeName(current)}`);
      }
      current = Object.getOwnPropertyDescriptor(current, name)?.value;
      evaluated = `${evaluated}.${name}`;
    }
    return current;
  }
}

/**
 * A parsed template.
 */
export interface CompiledTemplate {
  /**
   * Renders the template.
   *
   * @throws {TemplateError} When evaluation fails, e.g. on an unknown field.
   */
  execute(data: unknown): string;
}

/**
 * Parses a template.
 *
 * @example
 * ```typescript
 * const template = parseTemplate('{{range $i, $e := .Errors}}{{add $i 1}}. {{.Message}}\n{{end}}');
 * template.execute({ Errors: [{ Message: 'must be integer' }] }); // '1. must be integer\n'
 * ```
 *
 * @throws {TemplateError} On a syntax error.
 */
export function parseTemplate(source: string): CompiledTemplate {
  const tree = new TreeParser(segment(source)).parse();

  return {
    execute(data: unknown): string {
      return new Executor(data).run(tree, data);
    },
  };
}
