import { FormulaSyntaxError, MissingRequiredInputs } from './errors.ts';
import type { BucketValue, Formula, FormulaNode, FormulaOperator } from './types.ts';

interface Token {
  type: 'number' | 'metric' | 'operator' | 'paren';
  value: string;
}

// `neg` is unary minus; it binds tighter than any binary operator.
const NEGATE = 'neg';

const operatorPrecedence: Record<FormulaOperator | typeof NEGATE, number> = {
  '+': 1,
  '-': 1,
  '*': 2,
  '/': 2,
  [NEGATE]: 3,
};

function isOperator(value: string): value is FormulaOperator {
  return value === '+' || value === '-' || value === '*' || value === '/';
}

function isNumberChar(char: string): boolean {
  return /[0-9.]/.test(char);
}

function tokenizeFormula(source: string): Token[] {
  const tokens: Token[] = [];
  let index = 0;
  let prevType: Token['type'] | null = null;

  while (index < source.length) {
    const char = source[index];

    if (/\s/.test(char)) {
      index += 1;
      continue;
    }

    if (char === '{') {
      const close = source.indexOf('}', index);
      if (close === -1) {
        throw new FormulaSyntaxError(`Unclosed placeholder in formula: ${source}`);
      }
      const name = source.slice(index + 1, close).trim();
      if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(name)) {
        throw new FormulaSyntaxError(`Invalid placeholder in formula: {${name}}`);
      }
      tokens.push({ type: 'metric', value: name });
      prevType = 'metric';
      index = close + 1;
      continue;
    }

    if (isNumberChar(char)) {
      const start = index;
      index += 1;
      while (index < source.length && isNumberChar(source[index])) {
        index += 1;
      }
      tokens.push({ type: 'number', value: source.slice(start, index) });
      prevType = 'number';
      continue;
    }

    if (char === '(' || char === ')') {
      tokens.push({ type: 'paren', value: char });
      prevType = 'paren';
      index += 1;
      continue;
    }

    if (isOperator(char)) {
      const unary =
        char === '-' &&
        (prevType === null || prevType === 'operator' || (prevType === 'paren' && tokens[tokens.length - 1]?.value === '('));
      tokens.push({ type: 'operator', value: unary ? NEGATE : char });
      prevType = 'operator';
      index += 1;
      continue;
    }

    throw new FormulaSyntaxError(`Invalid character in formula: ${char}`);
  }

  return tokens;
}

function toRpn(tokens: Token[]): Token[] {
  const output: Token[] = [];
  const operators: Token[] = [];

  for (const token of tokens) {
    if (token.type === 'number' || token.type === 'metric') {
      output.push(token);
      continue;
    }

    if (token.type === 'operator') {
      // Binary operators are left associative; unary minus is right associative.
      const rightAssociative = token.value === NEGATE;
      while (operators.length > 0) {
        const top = operators[operators.length - 1];
        if (top.type !== 'operator') break;
        const topPrecedence = precedenceOf(top);
        if (topPrecedence > precedenceOf(token) || (!rightAssociative && topPrecedence === precedenceOf(token))) {
          output.push(top);
          operators.pop();
          continue;
        }
        break;
      }
      operators.push(token);
      continue;
    }

    if (token.value === '(') {
      operators.push(token);
      continue;
    }

    let matched = false;
    let op = operators.pop();
    while (op) {
      if (op.type === 'paren' && op.value === '(') {
        matched = true;
        break;
      }
      output.push(op);
      op = operators.pop();
    }
    if (!matched) {
      throw new FormulaSyntaxError('Mismatched parentheses in formula');
    }
  }

  for (let op = operators.pop(); op; op = operators.pop()) {
    if (op.type === 'paren') {
      throw new FormulaSyntaxError('Mismatched parentheses in formula');
    }
    output.push(op);
  }

  return output;
}

function precedenceOf(token: Token): number {
  if (token.value === NEGATE) {
    return operatorPrecedence[NEGATE];
  }
  return isOperator(token.value) ? operatorPrecedence[token.value] : 0;
}

function buildTree(rpn: Token[], source: string): FormulaNode {
  const stack: FormulaNode[] = [];

  for (const token of rpn) {
    if (token.type === 'number') {
      const value = Number(token.value);
      if (!Number.isFinite(value)) {
        throw new FormulaSyntaxError(`Invalid number in formula: ${token.value}`);
      }
      stack.push({ kind: 'literal', value });
      continue;
    }

    if (token.type === 'metric') {
      stack.push({ kind: 'metric', name: token.value });
      continue;
    }

    if (token.value === NEGATE) {
      const operand = stack.pop();
      if (!operand) {
        throw new FormulaSyntaxError(`Invalid formula: ${source}`);
      }
      stack.push({ kind: 'binary', operator: '-', left: { kind: 'literal', value: 0 }, right: operand });
      continue;
    }

    const right = stack.pop();
    const left = stack.pop();
    if (!left || !right || !isOperator(token.value)) {
      throw new FormulaSyntaxError(`Invalid formula: ${source}`);
    }
    stack.push({ kind: 'binary', operator: token.value, left, right });
  }

  const [root] = stack;
  if (stack.length !== 1 || !root) {
    throw new FormulaSyntaxError(`Invalid formula: ${source}`);
  }
  return root;
}

function collectReferences(node: FormulaNode, into: string[]): string[] {
  if (node.kind === 'metric' && !into.includes(node.name)) {
    into.push(node.name);
  } else if (node.kind === 'binary') {
    collectReferences(node.left, into);
    collectReferences(node.right, into);
  }
  return into;
}

/**
 * Parses a formula such as `{ga_total_time_on_page} / {ga_pageviews}` into an
 * expression tree. Parsing happens once, when the task document is loaded.
 */
export function parseFormula(source: string): Formula {
  const root = buildTree(toRpn(tokenizeFormula(source)), source);
  return { source, root, references: collectReferences(root, []) };
}

function evaluateNode(node: FormulaNode, resolved: Record<string, BucketValue>): BucketValue {
  switch (node.kind) {
    case 'literal':
      return node.value;
    case 'metric': {
      if (!Object.prototype.hasOwnProperty.call(resolved, node.name)) {
        throw new MissingRequiredInputs([node.name]);
      }
      const value = resolved[node.name];
      return value !== null && Number.isFinite(value) ? value : null;
    }
    case 'binary': {
      const left = evaluateNode(node.left, resolved);
      const right = evaluateNode(node.right, resolved);
      if (left === null || right === null) {
        return null;
      }
      switch (node.operator) {
        case '+':
          return left + right;
        case '-':
          return left - right;
        case '*':
          return left * right;
        case '/':
          return right === 0 ? null : left / right;
      }
    }
  }
}

/**
 * Evaluates a parsed formula for one bucket. `null` means the value is
 * undefined for the bucket (a zero divisor or an undefined operand).
 */
export function evaluateFormula(formula: Formula, resolved: Record<string, BucketValue>): BucketValue {
  const value = evaluateNode(formula.root, resolved);
  return value !== null && Number.isFinite(value) ? value : null;
}
