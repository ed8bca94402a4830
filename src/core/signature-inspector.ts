// src/core/signature-inspector.ts

import { parseExpression } from '@babel/parser';
import * as t from '@babel/types';
import { createArgument, type ArgumentDescriptor, type ArgumentValue } from './argument.js';
import type { CaptureMode, CommandCallable } from './types.js';
import { SchemaError } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';

export interface Signature {
  args: ArgumentDescriptor[];
  captureAll: boolean;
  captureMode: CaptureMode;
  /** Last parameter is an object pattern with a rest element (`{ ...options }`) */
  acceptsExtras: boolean;
}

type ParameterNode = t.ObjectMethod['params'][number];

type Evaluation = { evaluated: true; value: ArgumentValue } | { evaluated: false };

const wrappedTargets = new WeakMap<CommandCallable, CommandCallable>();
const signatureCache = new WeakMap<CommandCallable, Signature>();

/**
 * Record that `wrapper` forwards to `target`, so inspecting the wrapper reads
 * the target's parameter list.
 */
export function markWrapper(wrapper: CommandCallable, target: CommandCallable): void {
  wrappedTargets.set(wrapper, target);
}

export function unwrap(fn: CommandCallable): CommandCallable {
  let current = fn;
  let next = wrappedTargets.get(current);
  while (next) {
    current = next;
    next = wrappedTargets.get(current);
  }
  return current;
}

/**
 * Derive the argument schema of a function from its parameter list.
 *
 * The function's source text is parsed once and cached. Supported parameter
 * shapes:
 *
 * - `name`               required argument
 * - `name = <literal>`   optional argument typed after its default
 * - `...argv`            capture-all (must be the only parameter)
 * - `{ ...options }`     keyword catch-all (must be the last parameter)
 *
 * @throws SchemaError if the source cannot be parsed or uses another shape
 */
export function inspectSignature(fn: CommandCallable): Signature {
  const cached = signatureCache.get(fn);
  if (cached) {
    return cached;
  }

  const target = unwrap(fn);
  const label = target.name || '<anonymous>';
  const node = parseCallable(target.toString(), label);
  const signature = readSignature(node, label);

  Logger.debug(`Inspected '${label}': ${signature.args.map((arg) => arg.name).join(', ') || 'no arguments'}`);
  signatureCache.set(fn, signature);
  return signature;
}

function parseCallable(
  source: string,
  label: string
): t.FunctionExpression | t.ArrowFunctionExpression | t.ObjectMethod {
  const expression = tryParse(`(${source})`);
  if (t.isFunctionExpression(expression) || t.isArrowFunctionExpression(expression)) {
    return expression;
  }

  // Method shorthand (`run(name) { ... }`) only parses inside an object literal
  const wrapped = tryParse(`({${source}})`);
  if (t.isObjectExpression(wrapped)) {
    const [member] = wrapped.properties;
    if (t.isObjectMethod(member) && member.kind === 'method') {
      return member;
    }
  }

  throw new SchemaError(`Cannot read the parameter list of '${label}'`);
}

function tryParse(source: string): t.Expression | undefined {
  try {
    return parseExpression(source);
  } catch (error) {
    Logger.debug(`Source did not parse: ${error instanceof Error ? error.message : String(error)}`);
    return undefined;
  }
}

function readSignature(
  node: t.FunctionExpression | t.ArrowFunctionExpression | t.ObjectMethod,
  label: string
): Signature {
  const params: ParameterNode[] = node.params;
  const signature: Signature = {
    args: [],
    captureAll: false,
    captureMode: 'list',
    acceptsExtras: false,
  };

  params.forEach((param, index) => {
    const isLast = index === params.length - 1;

    if (t.isIdentifier(param)) {
      signature.args.push(createArgument(param.name));
      return;
    }

    if (t.isRestElement(param)) {
      if (params.length !== 1) {
        throw new SchemaError(
          `'${label}': a rest parameter captures all arguments and must be the only parameter`
        );
      }
      signature.captureAll = true;
      signature.captureMode = 'spread';
      return;
    }

    if (isExtrasPattern(param)) {
      if (!isLast) {
        throw new SchemaError(`'${label}': the { ...options } parameter must come last`);
      }
      signature.acceptsExtras = true;
      return;
    }

    if (t.isAssignmentPattern(param) && t.isIdentifier(param.left)) {
      signature.args.push(optionalArgument(param.left.name, param.right));
      return;
    }

    throw new SchemaError(
      `'${label}': parameter ${index + 1} uses destructuring, which cannot be bound to the command line`
    );
  });

  return signature;
}

function optionalArgument(name: string, defaultNode: t.Expression): ArgumentDescriptor {
  const evaluation = evaluateDefault(defaultNode);
  if (!evaluation.evaluated) {
    // JavaScript evaluates the real default when the value is left undefined
    return { ...createArgument(name), required: false };
  }
  return { ...createArgument(name, { defaultValue: evaluation.value }), required: false };
}

function isExtrasPattern(param: ParameterNode): boolean {
  const pattern = t.isAssignmentPattern(param) ? param.left : param;
  return (
    t.isObjectPattern(pattern) &&
    pattern.properties.length === 1 &&
    t.isRestElement(pattern.properties[0])
  );
}

/**
 * Evaluate literal defaults, including the `!0`, `!1` and `void 0` forms
 * minifiers emit.
 */
export function evaluateDefault(node: t.Expression): Evaluation {
  if (t.isBooleanLiteral(node) || t.isNumericLiteral(node) || t.isStringLiteral(node)) {
    return { evaluated: true, value: node.value };
  }
  if (t.isNullLiteral(node)) {
    return { evaluated: true, value: null };
  }
  if (t.isIdentifier(node) && node.name === 'undefined') {
    return { evaluated: true, value: undefined };
  }
  if (t.isTemplateLiteral(node) && node.expressions.length === 0) {
    const cooked = node.quasis[0]?.value.cooked;
    return cooked === undefined || cooked === null ? { evaluated: false } : { evaluated: true, value: cooked };
  }
  if (t.isUnaryExpression(node) && t.isNumericLiteral(node.argument)) {
    switch (node.operator) {
      case '-':
        return { evaluated: true, value: -node.argument.value };
      case '+':
        return { evaluated: true, value: node.argument.value };
      case '!':
        return { evaluated: true, value: !node.argument.value };
      case 'void':
        return { evaluated: true, value: undefined };
      default:
        return { evaluated: false };
    }
  }
  return { evaluated: false };
}

/** First non-empty line of a documentation string, without comment stars. */
export function firstLine(text: string): string | undefined {
  for (const raw of text.split('\n')) {
    const line = raw.replace(/^\s*\*+/, '').trim();
    if (line) {
      return line;
    }
  }
  return undefined;
}
