import { execute, parse } from '../src/index';
import {
  DEFAULT_MAX_DEPTH,
  Evaluator,
  EvaluatorOptions,
  InitializationError,
  ProgramResult,
} from '../src/runtime/evaluator';
import { Environment } from '../src/runtime/environment';
import { NONE, FALSE, TRUE, valueToString } from '../src/runtime/values';
import * as AST from '../src/parser/ast';

describe('Runtime', () => {
  function run(source: string, options?: EvaluatorOptions): ProgramResult {
    return execute(source, new Environment(), options);
  }

  function int(value: bigint) {
    return { kind: 'integer', value };
  }

  function str(value: string) {
    return { kind: 'string', value };
  }

  function err(message: string) {
    return { kind: 'error', message };
  }

  describe('arithmetic', () => {
    it('should respect operator precedence', () => {
      expect(run('1 + 2 * 3')).toEqual(int(7n));
      expect(run('(1 + 2) * 3')).toEqual(int(9n));
    });

    it('should be left-associative', () => {
      expect(run('8 - 4 - 2')).toEqual(int(2n));
    });

    it('should use integer division', () => {
      expect(run('7 / 2')).toEqual(int(3n));
      expect(run('-7 / 2')).toEqual(int(-3n));
    });

    it('should report division by zero', () => {
      expect(run('1 / 0')).toEqual(err('division by zero'));
    });

    it('should wrap around the signed 64-bit range', () => {
      expect(run('9223372036854775807 + 1')).toEqual(int(-9223372036854775808n));
    });

    it('should compare integers', () => {
      expect(run('1 < 2')).toEqual(TRUE);
      expect(run('2 > 3')).toEqual(FALSE);
      expect(run('4 == 4')).toEqual(TRUE);
      expect(run('4 != 4')).toEqual(FALSE);
    });

    it('should reject a non-integer right operand', () => {
      expect(run('1 + true')).toEqual(err("expected integer right operand for '+', got boolean true"));
    });

    it('should reject left operands other than integers and booleans', () => {
      expect(run('"a" + "b"')).toEqual(err('unsupported left operand for \'+\': string "a"'));
    });
  });

  describe('prefix operators', () => {
    it('should negate integers', () => {
      expect(run('-5')).toEqual(int(-5n));
    });

    it('should negate booleans', () => {
      expect(run('!true')).toEqual(FALSE);
      expect(run('!!true')).toEqual(TRUE);
    });

    it('should reject mismatched operand types', () => {
      expect(run('!5')).toEqual(err("expected boolean operand for '!', got integer 5"));
      expect(run('-true')).toEqual(err("expected integer operand for '-', got boolean true"));
    });
  });

  describe('booleans', () => {
    it('should compare booleans by value', () => {
      expect(run('true == true')).toEqual(TRUE);
      expect(run('true != false')).toEqual(TRUE);
      expect(run('(1 < 2) == (3 < 4)')).toEqual(TRUE);
    });

    it('should require a boolean right operand once the left is boolean', () => {
      expect(run('true == 1')).toEqual(err("expected boolean right operand for '==', got integer 1"));
    });

    it('should only allow equality operators', () => {
      expect(run('true + true')).toEqual(err('unsupported operator for booleans: +'));
    });
  });

  describe('variables', () => {
    it('should bind and retrieve variables', () => {
      expect(run('var x = 5; x * 2')).toEqual(int(10n));
    });

    it('should yield the bound value', () => {
      expect(run('var name = "tern";')).toEqual(str('tern'));
    });

    it('should report unresolved identifiers', () => {
      expect(run('y')).toEqual(err('cannot resolve identifier: y'));
    });

    it('should shadow outer bindings without changing them', () => {
      expect(run('var x = 1\nfn f() { var x = 2; x }\nf()\nx')).toEqual(int(1n));
    });

    it('should keep bindings across runs that share an environment', () => {
      const env = new Environment();
      execute('var x = 40;', env);
      expect(execute('x + 2', env)).toEqual(int(42n));
    });
  });

  describe('conditionals', () => {
    it('should evaluate the matching branch', () => {
      expect(run('if (1 < 2) { 10 } else { 20 }')).toEqual(int(10n));
      expect(run('if (1 > 2) { 10 } else { 20 }')).toEqual(int(20n));
    });

    it('should yield no value when the condition is false and there is no else', () => {
      expect(run('if (false) { 10 }')).toBe(NONE);
    });

    it('should require a boolean condition', () => {
      expect(run('if (1) { 10 }')).toEqual(err("expected boolean condition for 'if', got integer 1"));
    });

    it('should evaluate else-if chains', () => {
      const source = 'var n = 5\nif (n < 3) { "small" } else if (n < 10) { "medium" } else { "large" }';
      expect(run(source)).toEqual(str('medium'));
    });
  });

  describe('functions', () => {
    it('should call named functions', () => {
      expect(run('fn add(a, b) { return a + b; }\nadd(2, 3)')).toEqual(int(5n));
    });

    it('should yield the last value of the body without a return', () => {
      expect(run('fn add(a, b) { a + b }\nadd(2, 3)')).toEqual(int(5n));
    });

    it('should yield no value for a bare return', () => {
      expect(run('fn f() { return; }\nf()')).toBe(NONE);
    });

    it('should bind function declarations as ordinary values', () => {
      const result = run('fn pair(a, b) { a }');
      expect(result.kind).toBe('function');
      expect(valueToString(result)).toBe('<fn pair(a, b)>');
    });

    it('should keep lines separate in a function literal passed as an argument', () => {
      expect(run('fn apply(g) { g() }\napply(fn() {\n  5\n  -1\n})')).toEqual(int(-1n));
    });

    it('should call anonymous functions', () => {
      expect(run('var double = fn(x) { x * 2 };\ndouble(21)')).toEqual(int(42n));
      expect(run('fn(x) { x + 1 }(1)')).toEqual(int(2n));
    });

    it('should check arity', () => {
      expect(run('fn add(a, b) { a + b }\nadd(1)')).toEqual(
        err('wrong number of arguments for add: expected 2, got 1'),
      );
    });

    it('should report calls of values that are not functions', () => {
      expect(run('var x = 5; x(1)')).toEqual(err('function not found: x'));
      expect(run('missing(1)')).toEqual(err('function not found: missing'));
    });

    it('should support recursion', () => {
      const source = 'fn fib(n) { if (n < 2) { return n; } return fib(n - 1) + fib(n - 2); }\nfib(15)';
      expect(run(source)).toEqual(int(610n));
    });

    it('should support mutual recursion', () => {
      const source = [
        'fn isEven(n) { if (n == 0) { true } else { isOdd(n - 1) } }',
        'fn isOdd(n) { if (n == 0) { false } else { isEven(n - 1) } }',
        'isEven(10)',
      ].join('\n');
      expect(run(source)).toEqual(TRUE);
    });

    it('should resolve names in the declaring scope, not the caller', () => {
      const source = 'fn show() { secret }\nfn caller() { var secret = 1; show() }\ncaller()';
      expect(run(source)).toEqual(err('cannot resolve identifier: secret'));
    });

    it('should let closures observe later changes to captured bindings', () => {
      const source = [
        'var counter = 1',
        'fn make() { fn() { counter } }',
        'var get = make()',
        'var counter = 2',
        'get()',
      ].join('\n');
      expect(run(source)).toEqual(int(2n));
    });

    it('should evaluate arguments left to right and stop at the first error', () => {
      expect(run('fn f(a, b) { a }\nf(missing, 1 / 0)')).toEqual(err('cannot resolve identifier: missing'));
    });
  });

  describe('return', () => {
    const check = [
      'fn check(n) {',
      '  if (n > 0) {',
      '    if (n > 10) { return "big"; }',
      '    return "positive";',
      '  }',
      '  "non-positive"',
      '}',
    ].join('\n');

    it('should unwind through nested blocks to the end of the function', () => {
      expect(run(`${check}\ncheck(50)`)).toEqual(str('big'));
      expect(run(`${check}\ncheck(5)`)).toEqual(str('positive'));
      expect(run(`${check}\ncheck(-1)`)).toEqual(str('non-positive'));
    });

    it('should skip the statements after a return', () => {
      expect(run('fn f() { return 1; 1 / 0 }\nf()')).toEqual(int(1n));
    });

    it('should end only the function it appears in', () => {
      expect(run('fn f() { return 1; }\nvar a = f()\na + 1')).toEqual(int(2n));
    });

    it('should escape from an operand position', () => {
      expect(run('fn f() { var x = if (true) { return 5; }; 0 }\nf()')).toEqual(int(5n));
    });

    it('should end the program at top level', () => {
      expect(run('return 7;\n1 / 0')).toEqual(int(7n));
    });
  });

  describe('errors', () => {
    it('should abort the whole program', () => {
      expect(run('fn f() { 1 / 0 }\nvar a = f()\na + 1')).toEqual(err('division by zero'));
    });

    it('should evaluate the left operand first', () => {
      expect(run('missing + (1 / 0)')).toEqual(err('cannot resolve identifier: missing'));
    });
  });

  describe('loops', () => {
    it('should repeat while the condition holds', () => {
      const source = [
        'var i = 0',
        'var sum = 0',
        'for (i < 5) {',
        '  var sum = sum + i',
        '  var i = i + 1',
        '}',
        'sum',
      ].join('\n');
      expect(run(source)).toEqual(int(10n));
    });

    it('should yield the last body value', () => {
      expect(run('var i = 3\nfor (i > 0) { var i = i - 1 }')).toEqual(int(0n));
    });

    it('should yield no value when the body never runs', () => {
      expect(run('for (false) { 1 }')).toBe(NONE);
    });

    it('should require a boolean condition', () => {
      expect(run('for (1) { 1 }')).toEqual(err("expected boolean condition for 'for', got integer 1"));
    });

    it('should let a return leave the loop and the function', () => {
      const source = [
        'fn firstOver(limit) {',
        '  var i = 0',
        '  for (true) {',
        '    if (i * i > limit) { return i; }',
        '    var i = i + 1',
        '  }',
        '}',
        'firstOver(50)',
      ].join('\n');
      expect(run(source)).toEqual(int(8n));
    });
  });

  describe('limits', () => {
    it('should stop a run that exhausts its step budget', () => {
      expect(run('for (true) { 1 }', { maxSteps: 1000 })).toEqual(err('step budget of 1000 exhausted'));
    });

    it('should not affect programs that finish within the budget', () => {
      expect(run('1 + 2', { maxSteps: 1000 })).toEqual(int(3n));
    });

    it('should stop unbounded recursion', () => {
      expect(run('fn down(n) { down(n + 1) }\ndown(0)', { maxDepth: 50 })).toEqual(
        err('maximum call depth of 50 exceeded'),
      );
    });

    it.each([1, 2, 3, 4, 5])('should report an exhausted budget of %i steps wherever it runs out', maxSteps => {
      expect(run('fn f() { 1 }\nf()', { maxSteps })).toEqual(err(`step budget of ${maxSteps} exhausted`));
    });

    it('should finish a call given exactly the steps it needs', () => {
      expect(run('fn f() { 1 }\nf()', { maxSteps: 6 })).toEqual(int(1n));
    });

    describe('nesting', () => {
      const nested = [
        'fn d(n) {',
        '  if (n == 0) { return 0; } else {',
        '    var r = 1 + (if (true) { d(n - 1) });',
        '    return r;',
        '  }',
        '}',
      ].join('\n');

      it('should allow operator-heavy recursion up to the default depth', () => {
        expect(DEFAULT_MAX_DEPTH).toBe(200);
        expect(run(`${nested}\nd(199)`)).toEqual(int(199n));
      });

      it('should stop operator-heavy recursion at the default depth', () => {
        expect(run(`${nested}\nd(200)`)).toEqual(err('maximum call depth of 200 exceeded'));
      });

      it('should turn a host stack overflow into an error value', () => {
        expect(run(`${nested}\nd(20000)`, { maxDepth: 100000 })).toEqual(
          err('maximum evaluation depth exceeded'),
        );
      });

      it('should reject source nested too deeply to parse', () => {
        let caught: unknown;
        try {
          Evaluator.fromSource(`${'-'.repeat(20000)}1`);
        } catch (e) {
          caught = e;
        }
        expect(caught).toBeInstanceOf(InitializationError);
        if (caught instanceof InitializationError) {
          expect(caught.errors).toEqual([
            'Parse error at line 1, column 257: Expression nested too deeply (limit 256)',
          ]);
        }
      });
    });
  });

  describe('construction', () => {
    it('should produce identical results for repeated runs', () => {
      const evaluator = Evaluator.fromSource('fn sq(x) { x * x }\nsq(12) - 4');
      const first = evaluator.run(new Environment());
      const second = evaluator.run(new Environment());
      expect(first).toEqual(int(140n));
      expect(second).toEqual(first);
    });

    it('should evaluate a pre-built AST', () => {
      const { program, errors } = parse('var x = 2; x * 21');
      expect(errors).toEqual([]);
      expect(Evaluator.fromProgram(program).run()).toEqual(int(42n));
    });

    it('should reject an absent tree', () => {
      expect(() => Evaluator.fromProgram(null)).toThrow(InitializationError);
      expect(() => Evaluator.fromProgram(undefined)).toThrow('Submitted an empty AST');
    });

    it('should reject source with parse errors', () => {
      let caught: unknown;
      try {
        Evaluator.fromSource('var = 1');
      } catch (e) {
        caught = e;
      }
      expect(caught).toBeInstanceOf(InitializationError);
      if (caught instanceof InitializationError) {
        expect(caught.errors).toEqual([
          "Parse error at line 1, column 5: Expected IDENTIFIER but got ASSIGN '='",
        ]);
      }
    });

    it('should report operators the evaluator does not know', () => {
      const position = { line: 1, column: 1 };
      const one: AST.IntegerLiteral = { type: 'IntegerLiteral', value: 1n, position };
      const program: AST.Program = {
        type: 'Program',
        position,
        body: [
          {
            type: 'ExpressionStatement',
            position,
            expression: { type: 'InfixExpression', operator: '%', left: one, right: one, position },
          },
        ],
      };
      expect(Evaluator.fromProgram(program).run()).toEqual(err('unsupported operator for integers: %'));

      const negated: AST.Program = {
        type: 'Program',
        position,
        body: [
          {
            type: 'ExpressionStatement',
            position,
            expression: { type: 'PrefixExpression', operator: '~', right: one, position },
          },
        ],
      };
      expect(Evaluator.fromProgram(negated).run()).toEqual(err('unsupported prefix operator: ~'));
    });
  });

  describe('trace', () => {
    it('should log calls and returns', () => {
      const log = jest.spyOn(console, 'log').mockImplementation(() => {});
      try {
        run('fn add(a, b) { return a + b; }\nadd(2, 3)', { trace: true });
        expect(log.mock.calls.map(args => args[0])).toEqual([
          '  [trace] call add(2, 3)',
          '  [trace] return 5',
        ]);
      } finally {
        log.mockRestore();
      }
    });
  });
});
