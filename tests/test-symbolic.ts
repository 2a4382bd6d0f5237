import { describe, it, expect, vi, afterEach } from 'vitest';
import { symbolic, symbolicCall, symbolicVector, compareSymbolic, approx, power, quotient, difference } from '../src/symbolic';
import { applyRules, simplifyRules, PatternRule } from '../src/rules';
import { defineOperator, operatorInfo } from '../src/operators';
import { rational } from '../src/rational';

const x = symbolic.variable('x');
const y = symbolic.variable('y');

describe('construction', () => {
	it('interns structurally equal terms', () => {
		const a = symbolic.list(['+', 'x', ['*', 2, 'y']]);
		const b = x.add(symbolic.from(2).mul(y));
		expect(a).toBe(b);
		expect(symbolic.from(rational(4, 2))).toBe(symbolic.from(2));
	});

	it('keeps exact and approximate constants apart', () => {
		expect(approx(2)).not.toBe(symbolic.from(2));
		expect(approx(2).toString()).toBe('2.0');
		expect(symbolic.from(0.5).toString()).toBe('0.5');
		expect(symbolic.from(rational(1, 2)).toString()).toBe('1/2');
	});

	it('builds unary minus and named constants from lists', () => {
		expect(symbolic.list(['-', 'x'])).toBe(x.neg());
		expect(symbolic.list(['*', 'pi', 'x'])).toBe(symbolic.pi.mul(x));
		expect(symbolic.list(['log', 'x', 2])).toBe(symbolic.log(x, 2));
	});

	it('builds vectors and matrices from lists without an operator', () => {
		const m = symbolic.list([[1, 2], [3, 4]]);
		expect(m).toBeInstanceOf(symbolicVector);
		expect(m.arity).toBe(2);
		expect(m.operands[1]).toBe(symbolic.vector(3, 4));
	});

	it('rejects wrong arity and unknown operators', () => {
		expect(() => symbolic.call('sub', 1)).toThrow('sub takes 2 operands, got 1');
		expect(() => symbolic.call('eq', 1, 2, 3)).toThrow();
		expect(() => symbolic.call('log', 1, 2, 3)).toThrow('log takes 1..2 operands, got 3');
		expect(() => symbolic.call('frobnicate', 1)).toThrow('unknown operator frobnicate');
	});

	it('rejects ragged matrices', () => {
		expect(() => symbolic.list([[1, 2], [3]])).toThrow();
		expect(() => symbolic.list([[1, 2], 3])).toThrow();
	});

	it('refuses to redefine an operator', () => {
		expect(() => defineOperator({ name: 'add', evaluate: () => 0 })).toThrow('operator add is already defined');
		expect(operatorInfo('add').commutative).toBe(true);
	});
});

describe('predicates', () => {
	const e = symbolic.list(['+', ['*', 'x', 'y'], ['sin', 'x'], 3]);

	it('classifies terms', () => {
		expect(e.is('call')).toBe(true);
		expect(x.is('var')).toBe(true);
		expect(symbolic.from(3).is('const')).toBe(true);
		expect(e.isCall('add')).toBe(true);
		expect(e.isCall('mul')).toBe(false);
		expect(e.op).toBe('add');
		expect(e.arity).toBe(3);
	});

	it('counts occurrences and free variables', () => {
		expect(e.contains(y)).toBe(true);
		expect(e.occurrences(x)).toBe(2);
		expect([...e.freeVariables()].sort()).toEqual(['x', 'y']);
		expect(e.size()).toBe(7);
	});

	it('substitutes and replaces', () => {
		expect(e.substitute({ x: symbolic.from(0) })).toBe(symbolic.list(['+', ['*', 0, 'y'], ['sin', 0], 3]));
		expect(e.replace(symbolic.sin(x), symbolic.one)).toBe(symbolic.list(['+', ['*', 'x', 'y'], 1, 3]));
	});

	it('evaluates numerically', () => {
		expect(e.evaluate({ x: 0, y: 5 })).toBe(3);
		expect(x.evaluate()).toBeNaN();
		expect(symbolic.list(['^', 2, ['/', 1, 2]]).evaluate()).toBeCloseTo(Math.SQRT2);
	});
});

describe('ordering', () => {
	it('puts constants before named constants, variables, calls and vectors', () => {
		const items = [symbolic.vector(1), symbolic.sin(x), y, symbolic.pi, x, symbolic.from(-1), symbolic.from(2)];
		expect(items.sort(compareSymbolic).map(String)).toEqual(['-1', '2', 'π', 'x', 'y', 'sin(x)', '[1]']);
	});
});

describe('printing', () => {
	afterEach(() => symbolic.setDefaultStringifyOptions({ style: 'infix' }));

	it('prints infix with parentheses where needed', () => {
		expect(symbolic.list(['+', 'x', ['*', 2, 'y']]).toString()).toBe('x + 2 * y');
		expect(symbolic.list(['^', ['+', 'x', 1], 2]).toString()).toBe('(x + 1)^2');
		expect(symbolic.list(['=', ['-', 'x', ['-', 'y', 1]], 0]).toString()).toBe('x - (y - 1) = 0');
	});

	it('prints prefix when configured', () => {
		symbolic.setDefaultStringifyOptions({ style: 'prefix' });
		expect(symbolic.list(['+', 'x', ['*', 2, 'y']]).toString()).toBe('(+ x (* 2 y))');
	});
});

describe('matching and rules', () => {
	const A = symbolic.bind('A');

	it('matches commutative operands in any order', () => {
		const pattern = symbolic.call('mul', symbolic.exp(A), y);
		const bs = pattern.match(symbolic.list(['*', 'y', ['exp', 'x']]), {});
		expect(bs?.A).toBe(x);
	});

	it('keeps bindings consistent', () => {
		const pattern = symbolic.call('add', A, A);
		expect(pattern.match(symbolic.list(['+', 'x', 'x']), {})?.A).toBe(x);
		expect(pattern.match(symbolic.list(['+', 'x', 'y']), {})).toBeNull();
	});

	it('puts unmatched operands back around the replacement', () => {
		const node = symbolic.list(['*', ['exp', 'x'], ['exp', 'y'], 'z']);
		expect(applyRules(node, simplifyRules)).toBe(symbolic.list(['*', ['exp', ['+', 'x', 'y']], 'z']));
	});

	it('applies guards', () => {
		const rule = PatternRule('positive', symbolic.abs(A), bs => bs.A, bs => bs.A.evaluate() > 0);
		expect(applyRules(symbolic.abs(3), [rule])).toBe(symbolic.from(3));
		expect(applyRules(symbolic.abs(-3), [rule])).toBeUndefined();
	});

	it('returns undefined when nothing matches', () => {
		expect(applyRules(x, simplifyRules)).toBeUndefined();
	});
});

describe('tracing', () => {
	afterEach(() => {
		symbolic.setTraceLogging(false);
		vi.restoreAllMocks();
	});

	it('logs matcher bindings when enabled', () => {
		const log = vi.spyOn(console, 'log').mockImplementation(() => {});
		symbolic.setTraceLogging(true);
		symbolic.bind('Q').match(x, {});
		expect(log).toHaveBeenCalledWith('bound Q to x');
	});

	it('is silent by default', () => {
		const log = vi.spyOn(console, 'log').mockImplementation(() => {});
		symbolic.call('add', symbolic.bind('Q'), 1).match(symbolic.list(['+', 'x', 1]), {});
		expect(log).not.toHaveBeenCalled();
	});
});

describe('call structure', () => {
	it('reuses the node when operands are unchanged', () => {
		const e = symbolicCall.create('add', [x, y]);
		expect(e.with([x, y])).toBe(e);
		expect(e.with([y, x])).not.toBe(e);
	});
});

describe('builders', () => {
	it('drop only exact identities', () => {
		expect(power(x, symbolic.zero)).toBe(symbolic.one);
		expect(power(x, approx(0))).toBe(symbolicCall.create('pow', [x, approx(0)]));
		expect(power(x, approx(1))).toBe(symbolicCall.create('pow', [x, approx(1)]));
		expect(difference(x, approx(0))).toBe(symbolicCall.create('sub', [x, approx(0)]));
	});

	it('keep 0/0 as a quotient', () => {
		expect(quotient(symbolic.zero, x)).toBe(symbolic.zero);
		expect(quotient(symbolic.zero, symbolic.zero)).toBe(symbolicCall.create('div', [symbolic.zero, symbolic.zero]));
	});

	it('compare exact constants exactly', () => {
		expect(symbolic.from(rational(1n, 10n ** 400n)).isConst(0)).toBe(false);
		expect(symbolic.from(rational(1n, 10n ** 400n)).evaluate()).toBe(0);
	});
});
