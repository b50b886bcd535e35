/**
 * Evaluation mode: parse the script with acorn and run a partial interpreter
 * over the expressions that build request URLs.
 *
 * The interpreter only folds constants. It has no globals, performs no I/O and
 * never calls back into the host, so untrusted script text cannot do anything
 * but burn its budget. Reaching for eval, Function, require, import(), process
 * or globalThis inside an evaluated expression is a capability fault.
 */

import { parse, type AnyNode, type CallExpression, type Program } from 'acorn';
import { simple } from 'acorn-walk';
import { EvaluationFault, describeError, toEvaluationFault } from '../../core/errors.js';
import { evaluation } from '../../core/env.js';
import { MinedSet, type MinedEndpoints } from './endpoints.js';

export interface EvaluationBudget {
  /** Wall-clock budget, parse included */
  timeBudgetMs: number;
  maxSteps: number;
  maxSourceBytes: number;
  maxStringLength: number;
  /** Clock source, overridable in tests */
  now?: () => number;
}

export const DEFAULT_EVALUATION_BUDGET: EvaluationBudget = Object.freeze({
  timeBudgetMs: evaluation.TIME_BUDGET_MS,
  maxSteps: evaluation.MAX_STEPS,
  maxSourceBytes: evaluation.MAX_SOURCE_BYTES,
  maxStringLength: evaluation.MAX_STRING_LENGTH,
});

// =============================================================================
// Values
// =============================================================================

const UNKNOWN = Symbol('unknown');
type Unknown = typeof UNKNOWN;

class ObjectValue {
  constructor(readonly props: Map<string, Value>) {}
}

class ArrayValue {
  constructor(readonly items: Value[]) {}
}

type Primitive = string | number | boolean | null | undefined;
type Value = Primitive | ObjectValue | ArrayValue | Unknown;

function isPrimitive(value: Value): value is Primitive {
  return value !== UNKNOWN && !(value instanceof ObjectValue) && !(value instanceof ArrayValue);
}

function toStringValue(value: Value): string | Unknown {
  return isPrimitive(value) ? String(value) : UNKNOWN;
}

function truthy(value: Value): boolean | Unknown {
  if (value === UNKNOWN) return UNKNOWN;
  if (value instanceof ObjectValue || value instanceof ArrayValue) return true;
  return Boolean(value);
}

const CAPABILITY_NAMES = new Set(['eval', 'Function', 'require', 'process', 'globalThis']);

const MAX_ARRAY_ITEMS = 10_000;

const REQUEST_FUNCTIONS = new Set(['fetch', 'axios']);
const REQUEST_METHODS = new Set(['get', 'post', 'put', 'patch', 'delete', 'head', 'request', 'ajax', 'getJSON']);

// =============================================================================
// Interpreter
// =============================================================================

class Interpreter {
  private steps = 0;
  private readonly bindings = new Map<string, AnyNode>();
  private readonly ambiguous = new Set<string>();
  private readonly memo = new Map<string, Value>();
  private readonly resolving = new Set<string>();

  constructor(
    private readonly budget: EvaluationBudget,
    private readonly deadline: number,
    private readonly now: () => number
  ) {}

  bind(name: string, init: AnyNode): void {
    if (this.bindings.has(name)) {
      this.ambiguous.add(name);
      return;
    }
    this.bindings.set(name, init);
  }

  /** Names reassigned or shadowed somewhere resolve to unknown */
  markAmbiguous(name: string): void {
    this.ambiguous.add(name);
  }

  private step(): void {
    this.steps++;
    if (this.steps > this.budget.maxSteps) {
      throw new EvaluationFault('budget', `step limit ${this.budget.maxSteps} exceeded`);
    }
    if (this.now() >= this.deadline) {
      throw new EvaluationFault('budget', `time budget ${this.budget.timeBudgetMs}ms exceeded`);
    }
  }

  private checkSize(length: number): void {
    if (length > this.budget.maxStringLength) {
      throw new EvaluationFault('budget', `string longer than ${this.budget.maxStringLength} chars`);
    }
  }

  private checkLength(value: string): string {
    this.checkSize(value.length);
    return value;
  }

  private capability(name: string): never {
    throw new EvaluationFault('capability', `script reaches for ${name}`);
  }

  evaluate(node: AnyNode | null | undefined): Value {
    if (!node) return undefined;
    this.step();

    switch (node.type) {
      case 'Literal':
        if (node.regex || typeof node.value === 'bigint' || node.value instanceof RegExp) return UNKNOWN;
        return node.value;

      case 'TemplateLiteral': {
        let text = '';
        for (let i = 0; i < node.quasis.length; i++) {
          const quasi = node.quasis[i];
          if (!quasi || quasi.value.cooked === null || quasi.value.cooked === undefined) return UNKNOWN;
          text += quasi.value.cooked;
          const expression = node.expressions[i];
          if (expression) {
            const part = toStringValue(this.evaluate(expression));
            if (part === UNKNOWN) return UNKNOWN;
            text = this.checkLength(text + part);
          }
        }
        return this.checkLength(text);
      }

      case 'BinaryExpression': {
        if (node.operator !== '+' || node.left.type === 'PrivateIdentifier') return UNKNOWN;
        const left = this.evaluate(node.left);
        const right = this.evaluate(node.right);
        if (typeof left === 'number' && typeof right === 'number') return left + right;
        if (typeof left !== 'string' && typeof right !== 'string') return UNKNOWN;
        const l = toStringValue(left);
        const r = toStringValue(right);
        if (l === UNKNOWN || r === UNKNOWN) return UNKNOWN;
        return this.checkLength(l + r);
      }

      case 'Identifier':
        return this.resolve(node.name);

      case 'MemberExpression': {
        if (node.object.type === 'Super' || node.property.type === 'PrivateIdentifier') return UNKNOWN;
        const object = this.evaluate(node.object);
        const key = node.computed
          ? this.evaluate(node.property)
          : node.property.type === 'Identifier'
            ? node.property.name
            : UNKNOWN;
        return this.member(object, key);
      }

      case 'ChainExpression':
        return this.evaluate(node.expression);

      case 'ObjectExpression': {
        const props = new Map<string, Value>();
        for (const property of node.properties) {
          if (property.type !== 'Property' || property.kind !== 'init' || property.method) continue;
          const key = property.computed
            ? toStringValue(this.evaluate(property.key))
            : property.key.type === 'Identifier'
              ? property.key.name
              : property.key.type === 'Literal'
                ? toStringValue(this.evaluate(property.key))
                : UNKNOWN;
          if (key === UNKNOWN) continue;
          props.set(key, this.evaluate(property.value));
        }
        return new ObjectValue(props);
      }

      case 'ArrayExpression':
        return new ArrayValue(
          node.elements.map((element) =>
            element === null ? undefined : element.type === 'SpreadElement' ? UNKNOWN : this.evaluate(element)
          )
        );

      case 'CallExpression':
        return this.call(node);

      case 'NewExpression':
        if (node.callee.type === 'Identifier' && CAPABILITY_NAMES.has(node.callee.name)) {
          this.capability(node.callee.name);
        }
        return UNKNOWN;

      case 'ImportExpression':
        return this.capability('import()');

      case 'LogicalExpression': {
        const left = this.evaluate(node.left);
        if (node.operator === '??') {
          if (left === UNKNOWN) return UNKNOWN;
          return left === null || left === undefined ? this.evaluate(node.right) : left;
        }
        const test = truthy(left);
        if (test === UNKNOWN) return UNKNOWN;
        if (node.operator === '||') return test ? left : this.evaluate(node.right);
        return test ? this.evaluate(node.right) : left;
      }

      case 'ConditionalExpression': {
        const test = truthy(this.evaluate(node.test));
        if (test === UNKNOWN) return UNKNOWN;
        return this.evaluate(test ? node.consequent : node.alternate);
      }

      case 'SequenceExpression': {
        let last: Value = undefined;
        for (const expression of node.expressions) last = this.evaluate(expression);
        return last;
      }

      case 'UnaryExpression':
        // minifiers write undefined as `void 0`
        return node.operator === 'void' ? undefined : UNKNOWN;

      default:
        return UNKNOWN;
    }
  }

  private resolve(name: string): Value {
    if (CAPABILITY_NAMES.has(name)) this.capability(name);
    if (name === 'undefined') return undefined;
    if (this.ambiguous.has(name) || this.resolving.has(name)) return UNKNOWN;

    const cached = this.memo.get(name);
    if (cached !== undefined) return cached;

    const init = this.bindings.get(name);
    if (!init) return UNKNOWN;

    this.resolving.add(name);
    try {
      const value = this.evaluate(init);
      this.memo.set(name, value);
      return value;
    } finally {
      this.resolving.delete(name);
    }
  }

  private member(object: Value, key: Value): Value {
    if (object === UNKNOWN || key === UNKNOWN) return UNKNOWN;
    if (object instanceof ObjectValue) {
      return typeof key === 'string' ? (object.props.get(key) ?? UNKNOWN) : UNKNOWN;
    }
    if (object instanceof ArrayValue) {
      if (key === 'length') return object.items.length;
      return typeof key === 'number' ? (object.items[key] ?? UNKNOWN) : UNKNOWN;
    }
    if (typeof object === 'string') {
      if (key === 'length') return object.length;
      return typeof key === 'number' ? (object[key] ?? UNKNOWN) : UNKNOWN;
    }
    return UNKNOWN;
  }

  private argument(node: CallExpression, index: number): Value {
    const arg = node.arguments[index];
    if (!arg) return undefined;
    return arg.type === 'SpreadElement' ? UNKNOWN : this.evaluate(arg);
  }

  private call(node: CallExpression): Value {
    const callee = node.callee;

    if (callee.type === 'Identifier') {
      if (CAPABILITY_NAMES.has(callee.name)) this.capability(callee.name);
      if (callee.name === 'String') {
        return node.arguments.length === 0 ? '' : toStringValue(this.argument(node, 0));
      }
      if (callee.name === 'encodeURIComponent' || callee.name === 'encodeURI') {
        const value = toStringValue(this.argument(node, 0));
        if (value === UNKNOWN) return UNKNOWN;
        let encoded: string;
        try {
          encoded = callee.name === 'encodeURI' ? encodeURI(value) : encodeURIComponent(value);
        } catch (error) {
          // lone surrogates
          throw new EvaluationFault('runtime', `${callee.name}: ${describeError(error)}`, { cause: error });
        }
        return this.checkLength(encoded);
      }
      return UNKNOWN;
    }

    if (callee.type !== 'MemberExpression' || callee.computed || callee.property.type !== 'Identifier') {
      return UNKNOWN;
    }
    if (callee.object.type === 'Super') return UNKNOWN;

    const method = callee.property.name;
    const receiver = this.evaluate(callee.object);

    if (typeof receiver === 'string') return this.stringMethod(receiver, method, node);

    if (receiver instanceof ArrayValue) {
      if (method === 'join') {
        const sepValue = this.argument(node, 0);
        const separator = sepValue === undefined ? ',' : toStringValue(sepValue);
        if (separator === UNKNOWN) return UNKNOWN;
        let text = '';
        for (let i = 0; i < receiver.items.length; i++) {
          const item = receiver.items[i];
          const part = item === null || item === undefined ? '' : toStringValue(item);
          if (part === UNKNOWN) return UNKNOWN;
          text = this.checkLength(i === 0 ? part : text + separator + part);
        }
        return text;
      }
      if (method === 'concat') {
        const items = [...receiver.items];
        for (let i = 0; i < node.arguments.length; i++) {
          const value = this.argument(node, i);
          const added: Value[] = value instanceof ArrayValue ? value.items : [value];
          if (items.length + added.length > MAX_ARRAY_ITEMS) {
            throw new EvaluationFault('budget', `array longer than ${MAX_ARRAY_ITEMS} items`);
          }
          for (const item of added) items.push(item);
        }
        return new ArrayValue(items);
      }
    }

    return UNKNOWN;
  }

  private stringMethod(receiver: string, method: string, node: CallExpression): Value {
    switch (method) {
      case 'concat': {
        let text = receiver;
        for (let i = 0; i < node.arguments.length; i++) {
          const part = toStringValue(this.argument(node, i));
          if (part === UNKNOWN) return UNKNOWN;
          text = this.checkLength(text + part);
        }
        return text;
      }
      case 'toLowerCase':
        return this.checkLength(receiver.toLowerCase());
      case 'toUpperCase':
        return this.checkLength(receiver.toUpperCase());
      case 'trim':
        return receiver.trim();
      case 'trimStart':
        return receiver.trimStart();
      case 'trimEnd':
        return receiver.trimEnd();
      case 'replace':
      case 'replaceAll': {
        // string patterns only; regex literals evaluate to unknown
        const pattern = this.argument(node, 0);
        const replacement = this.argument(node, 1);
        if (typeof pattern !== 'string' || typeof replacement !== 'string') return UNKNOWN;
        if (method === 'replace') return this.checkLength(receiver.replace(pattern, () => replacement));
        const pieces = receiver.split(pattern);
        const growth = (pieces.length - 1) * (replacement.length - pattern.length);
        this.checkSize(receiver.length + growth);
        return pieces.join(replacement);
      }
      default:
        return UNKNOWN;
    }
  }

  /**
   * The URL a request call is made with, if the call looks like one
   */
  requestTarget(node: CallExpression): Value | null {
    const callee = node.callee;
    let index = -1;

    if (callee.type === 'Identifier' && REQUEST_FUNCTIONS.has(callee.name)) {
      index = 0;
    } else if (callee.type === 'MemberExpression' && !callee.computed && callee.property.type === 'Identifier') {
      const name = callee.property.name;
      if (name === 'open') index = 1;
      else if (REQUEST_METHODS.has(name)) index = 0;
    }
    if (index === -1) return null;

    const target = this.argument(node, index);
    // axios({ url }) and $.ajax({ url })
    if (target instanceof ObjectValue) return target.props.get('url') ?? UNKNOWN;
    return target;
  }
}

// =============================================================================
// Entry point
// =============================================================================

function parseScript(source: string): Program {
  try {
    return parse(source, {
      ecmaVersion: 'latest',
      sourceType: 'script',
      allowHashBang: true,
      allowReturnOutsideFunction: true,
    });
  } catch (scriptError) {
    try {
      return parse(source, { ecmaVersion: 'latest', sourceType: 'module', allowHashBang: true });
    } catch (moduleError) {
      throw new EvaluationFault('parse', describeError(scriptError), { cause: moduleError });
    }
  }
}

function runEvaluation(source: string, budget: EvaluationBudget): MinedEndpoints {
  const now = budget.now ?? Date.now;
  const deadline = now() + budget.timeBudgetMs;

  const size = Buffer.byteLength(source, 'utf8');
  if (size > budget.maxSourceBytes) {
    throw new EvaluationFault('budget', `script is ${size} bytes, limit ${budget.maxSourceBytes}`);
  }

  const program = parseScript(source);
  if (now() >= deadline) {
    throw new EvaluationFault('budget', `time budget ${budget.timeBudgetMs}ms exceeded while parsing`);
  }

  const interpreter = new Interpreter(budget, deadline, now);
  const requestCalls: CallExpression[] = [];
  const concatenations: AnyNode[] = [];
  const nestedConcatenations = new Set<AnyNode>();

  simple(program, {
    VariableDeclarator(node) {
      if (node.id.type !== 'Identifier') return;
      if (node.init) interpreter.bind(node.id.name, node.init);
      else interpreter.markAmbiguous(node.id.name);
    },
    AssignmentExpression(node) {
      if (node.left.type === 'Identifier') interpreter.markAmbiguous(node.left.name);
    },
    Function(node) {
      if (node.id) interpreter.markAmbiguous(node.id.name);
      for (const param of node.params) {
        if (param.type === 'Identifier') interpreter.markAmbiguous(param.name);
      }
    },
    CallExpression(node) {
      requestCalls.push(node);
      const callee = node.callee;
      if (
        callee.type === 'MemberExpression' &&
        !callee.computed &&
        callee.property.type === 'Identifier' &&
        (callee.property.name === 'concat' || callee.property.name === 'join')
      ) {
        concatenations.push(node);
      }
    },
    BinaryExpression(node) {
      if (node.operator !== '+') return;
      concatenations.push(node);
      if (node.left.type === 'BinaryExpression' && node.left.operator === '+') nestedConcatenations.add(node.left);
      if (node.right.type === 'BinaryExpression' && node.right.operator === '+') nestedConcatenations.add(node.right);
    },
    TemplateLiteral(node) {
      if (node.expressions.length > 0) concatenations.push(node);
    },
  });

  const mined = new MinedSet();
  const collect = (value: Value | null): void => {
    if (typeof value === 'string') mined.addEndpoint(value);
  };

  for (const call of requestCalls) {
    collect(interpreter.requestTarget(call));
  }
  for (const node of concatenations) {
    if (nestedConcatenations.has(node)) continue;
    collect(interpreter.evaluate(node));
  }

  return mined.toResult();
}

/**
 * Endpoints the script builds at run time. Every failure surfaces as an
 * EvaluationFault: parse, budget, capability, or runtime for host errors.
 */
export function mineByEvaluation(
  source: string,
  budget: EvaluationBudget = DEFAULT_EVALUATION_BUDGET
): MinedEndpoints {
  try {
    return runEvaluation(source, budget);
  } catch (error) {
    throw toEvaluationFault(error);
  }
}
