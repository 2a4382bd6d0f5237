import { symbolic, symbolicConstant, symbolicVariable, symbolicVector, constValue, sum, product, power, quotient, negate, difference, type Bindings } from './symbolic';
import { canonical, splitCoefficient, splitPower } from './canonical';
import { multiplyOut } from './expand';
import { simplify } from './simplify';
import { polynomialCoefficients, rewriteExponentials } from './polynomial';
import { rearrange, invertOuter } from './rearrange';
import { solveLinear, Placeholders } from './linear';
import { ok, fail, type Result } from './result';
import * as num from './rational';
import type { numeric, rational } from './rational';

export const allValues = Symbol('allValues');
export type SolutionSet<T> = typeof allValues | T[];

export interface SolveOptions {
	placeholders:	Placeholders;	// source of fresh names for free parameters
	ratio:			number;			// passed to simplify
	check:			boolean;		// drop candidates that do not satisfy the original equations
	tolerance:		number;			// for the numeric part of that check
	maxDepth:		number;			// nested strategy applications before giving up
}

type Options = Readonly<SolveOptions>;
type Solved<T> = Result<SolutionSet<T>, 'UnsolvableStrategy'>;

const defaultSolveOptions = {
	ratio:		4,
	check:		true,
	tolerance:	1e-9,
	maxDepth:	8,
};

function unsolvable(message: string) {
	return fail('UnsolvableStrategy', message);
}

function tidy(e: symbolic, opts: Options): symbolic {
	return simplify(e, { ratio: opts.ratio }) ?? canonical(e);
}

function dedupe<T>(items: T[], key: (i: T) => string): T[] {
	const seen = new Set<string>();
	return items.filter(i => !seen.has(key(i)) && !!seen.add(key(i)));
}

function bindingsKey(b: Bindings): string {
	return Object.keys(b).sort().map(k => `${k}:${b[k].id}`).join(';');
}

//-----------------------------------------------------------------------------
// polynomials
//-----------------------------------------------------------------------------

function exactCoefficients(coefs: readonly symbolic[]): rational[] | undefined {
	const result: rational[] = [];
	for (const c of coefs) {
		const v = constValue(c);
		if (v === undefined || !num.isExact(v))
			return undefined;
		result.push(v);
	}
	return result;
}

function hornerExact(coefs: readonly rational[], x: rational): rational {
	return coefs.reduceRight((acc, c) => acc.mul(x).add(c), num.zero);
}

// positive divisors, or just the trivial ones for numbers too large to factor by trial division
function divisors(n: bigint): bigint[] {
	if (n < 0n)
		n = -n;
	if (n > num.maxRootOperand)
		return n === 1n ? [1n] : [1n, n];
	const small: bigint[] = [];
	const large: bigint[] = [];
	for (let i = 1n; i * i <= n; i++) {
		if (n % i === 0n) {
			small.push(i);
			if (i * i !== n)
				large.unshift(n / i);
		}
	}
	return [...small, ...large];
}

// divide by (x - r), lowest power first
function deflate(coefs: readonly rational[], r: rational): rational[] {
	const n = coefs.length - 1;
	const q: rational[] = new Array<rational>(n);
	let carry = num.zero;
	for (let i = n; i > 0; i--) {
		carry = carry.mul(r).add(coefs[i]);
		q[i - 1] = carry;
	}
	return q;
}

function rationalRootCandidates(coefs: readonly rational[]): rational[] {
	const scale	= coefs.reduce((l, c) => l.lcm(c.d), num.one);
	const ints	= coefs.map(c => num.numerator(c.mul(scale)));
	const ps	= divisors(ints[0]);
	const qs	= divisors(ints[ints.length - 1]);
	const candidates = ps.flatMap(p => qs.flatMap(q => [num.rational(p, q), num.rational(-p, q)]));
	return dedupe(candidates, c => num.key(c));
}

function constSign(e: symbolic): number | undefined {
	const v = constValue(e);
	return v === undefined ? undefined : num.sign(v);
}

function quadratic(c: symbolic, b: symbolic, a: symbolic, opts: Options): symbolic[] {
	const disc	= tidy(difference(power(b, symbolic.from(2)), product(symbolic.from(4), a, c)), opts);
	const s		= constSign(disc);
	const twoA	= product(symbolic.from(2), a);
	if (s !== undefined && s < 0)
		return [];
	if (s === 0)
		return [tidy(quotient(negate(b), twoA), opts)];
	const root = symbolic.sqrt(disc);
	return [
		tidy(quotient(sum(negate(b), root), twoA), opts),
		tidy(quotient(difference(negate(b), root), twoA), opts),
	];
}

// real roots of Σ coefs[i]·x^i
export function solvePolynomial(coefs: readonly symbolic[], options: Partial<SolveOptions> = {}): Solved<symbolic> {
	const opts = { ...defaultSolveOptions, placeholders: new Placeholders(), ...options };
	return polynomialRoots(coefs, opts);
}

function polynomialRoots(coefs: readonly symbolic[], opts: Options): Solved<symbolic> {
	if (coefs.length === 0)
		return ok(allValues);
	if (coefs.length === 1) {
		const s = constSign(coefs[0]);
		return s === undefined ? unsolvable(`cannot decide whether ${coefs[0]} is zero`) : ok(s === 0 ? allValues : []);
	}

	// zero roots
	const zeros = coefs.findIndex(c => !c.isConst(0));
	if (zeros > 0) {
		const rest = polynomialRoots(coefs.slice(zeros), opts);
		return !rest.ok ? rest : ok(rest.value === allValues ? allValues : dedupe([symbolic.zero, ...rest.value], i => i.id));
	}

	// x^g substitution
	const g = coefs.reduce((g, c, i) => c.isConst(0) ? g : num.gcd(g, i), 0);
	if (g > 1) {
		const sub = polynomialRoots(coefs.filter((_, i) => i % g === 0), opts);
		if (!sub.ok || sub.value === allValues)
			return sub;
		const roots = sub.value.flatMap(r => {
			const s = constSign(r);
			if (g % 2 === 0 && s !== undefined && s < 0)
				return [];
			const x = tidy(power(r, symbolic.from(num.rational(1, g))), opts);
			return g % 2 === 0 && s !== 0 ? [x, tidy(negate(x), opts)] : [x];
		});
		return ok(dedupe(roots, i => i.id));
	}

	const degree = coefs.length - 1;
	if (degree === 1)
		return ok([tidy(quotient(negate(coefs[0]), coefs[1]), opts)]);
	if (degree === 2)
		return ok(dedupe(quadratic(coefs[0], coefs[1], coefs[2], opts), i => i.id));

	// rational roots, deflating as they are found
	let exact = exactCoefficients(coefs);
	if (!exact)
		return unsolvable(`no method for degree ${degree} with coefficients ${coefs.join(', ')}`);

	const roots: symbolic[] = [];
	for (const r of rationalRootCandidates(exact)) {
		while (exact.length > 3 && num.isZero(hornerExact(exact, r))) {
			roots.push(symbolicConstant.create(r));
			exact = deflate(exact, r);
		}
	}
	if (exact.length > 3)
		return unsolvable(`degree ${exact.length - 1} factor has no rational roots`);

	const rest = polynomialRoots(exact.map(c => symbolicConstant.create(c)), opts);
	return !rest.ok || rest.value === allValues ? rest : ok(dedupe([...roots, ...rest.value], i => i.id));
}

//-----------------------------------------------------------------------------
// single equation, single unknown
//-----------------------------------------------------------------------------

// maximal sub-expressions containing x that are not sums, products or integer powers
function atoms(e: symbolic, x: symbolic, found = new Set<symbolic>()): Set<symbolic> {
	if (!e.contains(x))
		return found;
	if (e === x)
		found.add(e);
	else if (e.isCall('add') || e.isCall('mul'))
		e.operands.forEach(i => atoms(i, x, found));
	else if (e.isCall('pow') && constValue(e.operands[1]) !== undefined && num.isInteger(constValue(e.operands[1]) ?? NaN))
		atoms(e.operands[0], x, found);
	else
		found.add(e);
	return found;
}

// multiply every term through by the denominators that contain x
function clearDenominators(x: symbolic, residual: symbolic): symbolic | undefined {
	const terms = residual.isCall('add') ? residual.operands : [residual];
	const dens	= new Map<symbolic, numeric>();

	for (const t of terms) {
		for (const f of t.isCall('mul') ? t.operands : [t]) {
			const [base, exponent] = splitPower(f);
			const k = constValue(exponent);
			if (k !== undefined && num.sign(k) < 0 && base.contains(x)) {
				const prev = dens.get(base);
				if (prev === undefined || num.compare(num.neg(k), prev) > 0)
					dens.set(base, num.neg(k));
			}
		}
	}
	if (dens.size === 0)
		return undefined;

	const multiplier = [...dens].map(([base, k]) => power(base, symbolicConstant.create(k)));
	return multiplyOut(sum(...terms.map(t => canonical(product(t, ...multiplier)))));
}

// exp(a + b) → exp(a)·exp(b), exp(c·log f) → f^c, exp(log f) → f
function splitExp(arg: symbolic): symbolic {
	const terms = arg.isCall('add') ? arg.operands : [arg];
	return product(...terms.map(t => {
		if (t.isCall('log') && t.arity === 1)
			return t.operands[0];
		const [c, rest] = splitCoefficient(t);
		return rest.isCall('log') && rest.arity === 1
			? power(rest.operands[0], symbolicConstant.create(c))
			: symbolic.exp(t);
	}));
}

// kernel = r restated one operator further in, when x sits in just one operand of the kernel
function unwrapKernel(x: symbolic, kernel: symbolic, r: symbolic): symbolic[] {
	const step = kernel.operands.filter(i => i.contains(x)).length === 1 ? invertOuter(x, kernel, r) : undefined;
	return step ? step[1].map(b => difference(step[0], b)) : [canonical(difference(kernel, r))];
}

function solveOne(x: symbolic, residual: symbolic, opts: Options, depth: number): Solved<symbolic> {
	const done = symbolic.trace(() => `solve ${residual} = 0 for ${x}`);
	try {
		if (depth > opts.maxDepth)
			return unsolvable(`gave up on ${residual} = 0 after ${opts.maxDepth} steps`);

		// no occurrence
		const n = residual.occurrences(x);
		if (n === 0) {
			const s = constSign(residual);
			if (s === undefined)
				return unsolvable(`${residual} = 0 does not involve ${x}`);
			return ok(s === 0 ? allValues : []);
		}

		// single occurrence
		if (n === 1) {
			const r = rearrange(x, residual.equals(0));
			if (r.ok) {
				symbolic.trace(() => 'rearranged')();
				return ok(dedupe(r.value.map(eq => tidy(eq.operands[1], opts)), i => i.id));
			}
		}

		// rational equation
		const cleared = clearDenominators(x, residual);
		if (cleared) {
			symbolic.trace(() => `cleared denominators: ${cleared}`)();
			return solveOne(x, cleared, opts, depth + 1);
		}

		const rewritten	= rewriteExponentials(residual, x);
		const found		= [...atoms(rewritten, x)];

		// polynomial in x
		if (found.length === 1 && found[0] === x) {
			const coefs = polynomialCoefficients(x, residual);
			if (coefs.ok) {
				symbolic.trace(() => `polynomial ${coefs.value.join(', ')}`)();
				return polynomialRoots(coefs.value, opts);
			}
		}

		// polynomial in a single kernel such as 2^x or exp(x)
		if (found.length === 1) {
			const kernel	= found[0];
			const coefs		= polynomialCoefficients(kernel, rewritten);
			if (coefs.ok) {
				symbolic.trace(() => `polynomial in ${kernel}`)();
				const roots = polynomialRoots(coefs.value, opts);
				if (!roots.ok || roots.value === allValues)
					return roots;

				const values: symbolic[] = [];
				let solved = roots.value.length === 0;
				for (const r of roots.value) {
					const next = unwrapKernel(x, kernel, r);
					if (next.length === 0)
						solved = true;
					for (const e of next) {
						const sub = solveOne(x, tidy(e, opts), opts, depth + 1);
						if (sub.ok && sub.value !== allValues) {
							values.push(...sub.value);
							solved = true;
						}
					}
				}
				if (solved)
					return ok(dedupe(values, i => i.id));
			}
		}

		// logarithms: isolate one log term and exponentiate both sides
		if (found.length > 0 && found.every(i => i.isCall('log') && i.arity === 1)) {
			const terms = residual.isCall('add') ? residual.operands : [residual];
			const index = terms.findIndex(t => {
				const [, rest] = splitCoefficient(t);
				return rest.isCall('log') && rest.contains(x);
			});
			if (index >= 0) {
				const [c, log] = splitCoefficient(terms[index]);
				const others	= terms.filter((_, i) => i !== index);
				const target	= multiplyOut(quotient(negate(sum(...others)), symbolicConstant.create(c)));
				const next		= canonical(difference(log.operands[0], splitExp(target)));
				symbolic.trace(() => `exponentiated: ${next} = 0`)();
				return solveOne(x, next, opts, depth + 1);
			}
		}

		return unsolvable(`no strategy for ${residual} = 0 in ${x}`);
	} finally {
		done();
	}
}

//-----------------------------------------------------------------------------
// systems
//-----------------------------------------------------------------------------

function unknownsIn(residual: symbolic, unknowns: readonly symbolicVariable[]): symbolicVariable[] {
	return unknowns.filter(u => residual.contains(u));
}

// split vector equations into components, simplify, and drop the trivial ones; undefined if one is false
function prepare(residuals: readonly symbolic[], opts: Options): symbolic[] | undefined {
	const result: symbolic[] = [];
	for (const r of residuals) {
		const t = tidy(r, opts);
		const parts = t instanceof symbolicVector ? t.operands.flatMap(i => i instanceof symbolicVector ? i.operands : [i]) : [t];
		for (const p of parts) {
			const s = constSign(p);
			if (s === undefined)
				result.push(p);
			else if (s !== 0)
				return undefined;
		}
	}
	return result;
}

function toResidual(equation: symbolic): symbolic {
	if (!equation.isCall('eq'))
		return equation;
	const [lhs, rhs] = equation.operands;
	if (lhs instanceof symbolicVector && rhs instanceof symbolicVector && lhs.arity !== rhs.arity)
		throw new Error(`equation between vectors of lengths ${lhs.arity} and ${rhs.arity}`);
	return difference(lhs, rhs);
}

// groups of residuals that share no unknowns
function components(residuals: readonly symbolic[], unknowns: readonly symbolicVariable[]): [symbolic[], symbolicVariable[]][] {
	const parent = residuals.map((_, i) => i);
	const find = (i: number): number => parent[i] === i ? i : (parent[i] = find(parent[i]));

	const owner = new Map<symbolicVariable, number>();
	residuals.forEach((r, i) => {
		for (const u of unknownsIn(r, unknowns)) {
			const j = owner.get(u);
			if (j === undefined)
				owner.set(u, i);
			else
				parent[find(i)] = find(j);
		}
	});

	const groups = new Map<number, [symbolic[], symbolicVariable[]]>();
	residuals.forEach((r, i) => {
		const root = find(i);
		const group = groups.get(root) ?? [[], []];
		group[0].push(r);
		groups.set(root, group);
	});
	for (const [u, i] of owner)
		groups.get(find(i))?.[1].push(u);

	return [...groups.values()];
}

function cartesian(sets: readonly Bindings[][]): Bindings[] {
	return sets.reduce<Bindings[]>((acc, set) => acc.flatMap(a => set.map(b => ({ ...a, ...b }))), [{}]);
}

function solveSystem(unknowns: readonly symbolicVariable[], residuals: readonly symbolic[], opts: Options, depth: number): Solved<Bindings> {
	const prepared = prepare(residuals, opts);
	if (!prepared)
		return ok([]);
	if (prepared.length === 0)
		return ok(allValues);

	const results: Bindings[][] = [];
	for (const [eqs, us] of components(prepared, unknowns)) {
		const r = solveComponent(us, eqs, opts, depth);
		if (!r.ok)
			return r;
		if (r.value !== allValues) {
			if (r.value.length === 0)
				return ok([]);
			results.push(r.value);
		}
	}
	return ok(cartesian(results));
}

function solveComponent(unknowns: readonly symbolicVariable[], residuals: readonly symbolic[], opts: Options, depth: number): Solved<Bindings> {
	if (unknowns.length === 0)
		return unsolvable(`${residuals.join(', ')} do not involve the unknowns`);

	if (unknowns.length === 1 && residuals.length === 1) {
		const x = unknowns[0];
		const r = solveOne(x, residuals[0], opts, depth);
		return !r.ok ? r : r.value === allValues ? ok(r.value) : ok(r.value.map(v => ({ [x.name]: v })));
	}

	const linear = solveLinear(unknowns, residuals, { placeholders: opts.placeholders });
	if (linear.ok) {
		symbolic.trace(() => `linear in ${unknowns.join(', ')}`)();
		return ok([linear.value]);
	}
	if (linear.failure.kind === 'InconsistentSystem')
		return ok([]);

	return substitution(unknowns, residuals, opts, depth);
}

// solve one equation for one unknown, substitute into the rest, recurse, then back-substitute
function substitution(unknowns: readonly symbolicVariable[], residuals: readonly symbolic[], opts: Options, depth: number): Solved<Bindings> {
	if (depth > opts.maxDepth)
		return unsolvable(`gave up on system after ${opts.maxDepth} steps`);

	const pairs = residuals.flatMap((r, i) => unknownsIn(r, unknowns).map(u => ({ i, u, count: unknownsIn(r, unknowns).length, occurs: r.occurrences(u) })));
	pairs.sort((a, b) => a.count - b.count || a.occurs - b.occurs);

	for (const { i, u } of pairs) {
		const done = symbolic.trace(() => `substitution: ${residuals[i]} = 0 for ${u}`);
		try {
			const values = solveOne(u, residuals[i], opts, depth + 1);
			if (!values.ok || values.value === allValues)
				continue;

			const rest		= residuals.filter((_, j) => j !== i);
			const remaining	= unknowns.filter(v => v !== u);
			const results: Bindings[] = [];
			let solved = values.value.length === 0;

			for (const v of values.value) {
				const sub = solveSystem(remaining, rest.map(r => r.substitute({ [u.name]: v })), opts, depth + 1);
				if (!sub.ok)
					continue;
				solved = true;
				const found: Bindings[] = sub.value === allValues ? [{}] : sub.value;
				for (const b of found)
					results.push({ ...b, [u.name]: tidy(v.substitute(b), opts) });
			}
			if (solved)
				return ok(results);
		} finally {
			done();
		}
	}
	return unsolvable(`no equation of ${residuals.join(', ')} could be solved for ${unknowns.join(', ')}`);
}

//-----------------------------------------------------------------------------
// checking candidates
//-----------------------------------------------------------------------------

function hasDivisionByZero(e: symbolic): boolean {
	return (e.isCall('pow') && e.operands[0].isConst(0) && (constSign(e.operands[1]) ?? 0) < 0)
		|| e.operands.some(hasDivisionByZero);
}

// residual evaluated at a point; undefined where it has no finite value
function vanishes(residual: symbolic, values: Record<string, number>, opts: Options): boolean | undefined {
	const value = residual.evaluate(values);
	if (!Number.isFinite(value))
		return undefined;
	const scale = Math.max(1, ...residual.operands.map(i => Math.abs(i.evaluate(values))).filter(Number.isFinite));
	return Math.abs(value) <= opts.tolerance * scale;
}

// values given to leftover symbols when checking a candidate
const samplePoints = [0.5772156649015329, 1.4142135623730951];

function holds(residual: symbolic, opts: Options): boolean {
	if (residual instanceof symbolicVector)
		return residual.operands.every(i => holds(i, opts));

	const names = [...residual.freeVariables()].sort();
	if (names.length === 0)
		return vanishes(residual, {}, opts) ?? false;

	// leftover parameters must cancel at every sample point
	const checks = samplePoints
		.map(p => vanishes(residual, Object.fromEntries(names.map((n, i) => [n, p + 0.1 * i])), opts))
		.filter((i): i is boolean => i !== undefined);
	return checks.length ? checks.every(Boolean) : !hasDivisionByZero(residual);
}

function satisfies(b: Bindings, residuals: readonly symbolic[], opts: Options): boolean {
	return residuals.every(r => holds(tidy(r.substitute(b), opts), opts));
}

//-----------------------------------------------------------------------------
// entry point
//-----------------------------------------------------------------------------

function asUnknown(u: string | symbolic): symbolicVariable {
	const v = typeof u === 'string' ? symbolicVariable.create(u) : u;
	if (!(v instanceof symbolicVariable))
		throw new Error(`unknown ${v} is not a variable`);
	return v;
}

export function solve(unknown: string | symbolic, equations: symbolic | readonly symbolic[], options?: Partial<SolveOptions>): Result<SolutionSet<symbolic>, 'UnsolvableStrategy'>;
export function solve(unknowns: readonly (string | symbolic)[], equations: symbolic | readonly symbolic[], options?: Partial<SolveOptions>): Result<SolutionSet<Bindings>, 'UnsolvableStrategy'>;
export function solve(unknowns: string | symbolic | readonly (string | symbolic)[], equations: symbolic | readonly symbolic[], options?: Partial<SolveOptions>): Result<SolutionSet<symbolic> | SolutionSet<Bindings>, 'UnsolvableStrategy'> {
	const opts: Options	= { ...defaultSolveOptions, placeholders: new Placeholders(), ...options };
	const single		= !Array.isArray(unknowns);
	const us			= (typeof unknowns === 'string' || unknowns instanceof symbolic ? [unknowns] : unknowns).map(asUnknown);
	const residuals		= (equations instanceof symbolic ? [equations] : equations).map(toResidual);

	const done = symbolic.trace(() => `solve for ${us.join(', ')}: ${residuals.map(r => `${r} = 0`).join(', ')}`);
	try {
		const r = solveSystem(us, residuals, opts, 0);
		if (!r.ok || r.value === allValues)
			return r;

		const checked	= opts.check ? prepare(residuals, opts) ?? [] : [];
		const solutions	= dedupe(r.value
			.map(b => {
				const full: Bindings = {};
				for (const u of us)
					full[u.name] = b[u.name] ? tidy(b[u.name], opts) : opts.placeholders.next();
				return full;
			})
			.filter(b => satisfies(b, checked, opts)),
			bindingsKey
		);

		return ok(single ? dedupe(solutions.map(b => b[us[0].name]), i => i.id) : solutions);
	} finally {
		done();
	}
}
