import Fraction from 'fraction.js';

// Numbers carried by constants:
//	- exact values are fractions of big integers (always in lowest terms)
//	- approximate values are plain floating point numbers
// Arithmetic on two exact values stays exact; a float operand makes the result a float.

export type rational	= Fraction;
export type numeric		= rational | number;

// exact powers whose result would need more bits than this are left unevaluated
export const maxExactBits	= 4096;

// roots are found by factoring, so only numerators and denominators up to this size are tried
export const maxRootOperand	= 2n ** 40n;

export function rational(n: number | bigint, d: number | bigint = 1): rational {
	if ((typeof n === 'number' && !Number.isInteger(n)) || (typeof d === 'number' && !Number.isInteger(d)))
		throw new Error(`rational needs integer parts, got ${n}/${d}`);
	if (BigInt(d) === 0n)
		throw new Error('rational with zero denominator');
	return new Fraction(BigInt(n), BigInt(d));
}

export const zero		= rational(0);
export const one		= rational(1);
export const minusOne	= rational(-1);
export const half		= rational(1, 2);

export function isExact(n: numeric): n is rational {
	return n instanceof Fraction;
}

export function isRational(n: unknown): n is rational {
	return n instanceof Fraction;
}

export function toNumber(n: numeric): number {
	return typeof n === 'number' ? n : n.valueOf();
}

export function numerator(n: rational): bigint {
	return n.s * n.n;
}

export function denominator(n: rational): bigint {
	return n.d;
}

function safe(b: bigint): number | undefined {
	const v = Number(b);
	return Number.isSafeInteger(v) ? v : undefined;
}

// an exact integer small enough to count with
export function smallInteger(n: numeric): number | undefined {
	return isExact(n) && n.d === 1n ? safe(numerator(n)) : undefined;
}

export function sign(n: numeric): number {
	if (typeof n === 'number')
		return Math.sign(n);
	return n.n === 0n ? 0 : Number(n.s);
}

export function isZero(n: numeric): boolean		{ return isExact(n) ? n.n === 0n : n === 0; }
export function isOne(n: numeric): boolean		{ return isExact(n) ? n.equals(1) : n === 1; }
export function isMinusOne(n: numeric): boolean	{ return isExact(n) ? n.equals(-1) : n === -1; }

export function isInteger(n: numeric): boolean {
	return typeof n === 'number' ? Number.isInteger(n) : n.d === 1n;
}

export function isEven(n: numeric): boolean {
	return isExact(n) && n.d === 1n && n.n % 2n === 0n;
}

export function add(a: numeric, b: numeric): numeric {
	return isExact(a) && isExact(b) ? a.add(b) : toNumber(a) + toNumber(b);
}

export function sub(a: numeric, b: numeric): numeric {
	return isExact(a) && isExact(b) ? a.sub(b) : toNumber(a) - toNumber(b);
}

export function mul(a: numeric, b: numeric): numeric {
	return isExact(a) && isExact(b) ? a.mul(b) : toNumber(a) * toNumber(b);
}

export function div(a: numeric, b: numeric): numeric | undefined {
	if (isZero(b))
		return undefined;
	return isExact(a) && isExact(b) ? a.div(b) : toNumber(a) / toNumber(b);
}

export function neg(a: numeric): numeric {
	return isExact(a) ? a.neg() : -a;
}

export function abs(a: numeric): numeric {
	return isExact(a) ? a.abs() : Math.abs(a);
}

export function recip(a: numeric): numeric | undefined {
	return div(one, a);
}

export function compare(a: numeric, b: numeric): number {
	if (isExact(a) && isExact(b))
		return a.compare(b);
	return Math.sign(toNumber(a) - toNumber(b));
}

export function equals(a: numeric, b: numeric): boolean {
	return isExact(a) && isExact(b) ? a.equals(b) : toNumber(a) === toNumber(b);
}

export function gcd(a: number, b: number): number {
	return new Fraction(a).gcd(b).valueOf();
}

// floor(log2 |b|), and 0 for 0 and ±1
function log2(b: bigint): number {
	return (b < 0n ? -b : b).toString(2).length - 1;
}

// a^k; undefined for 0^-k and for results too large to keep
export function ipow(a: rational, k: number): rational | undefined {
	if (k < 0 && a.n === 0n)
		return undefined;
	if (Math.max(log2(a.n), log2(a.d)) * Math.abs(k) > maxExactBits)
		return undefined;
	return a.pow(k) ?? undefined;
}

// the rational k-th root, if there is one
export function exactRoot(a: rational, k: number): rational | undefined {
	if (a.n === 0n)
		return zero;
	if (a.s < 0n) {
		if (k % 2 === 0)
			return undefined;
		const r = exactRoot(a.neg(), k);
		return r && r.neg();
	}
	if (a.n > maxRootOperand || a.d > maxRootOperand)
		return undefined;
	return a.pow(new Fraction(1, k)) ?? undefined;
}

// undefined when the result is not a (real) number of the same exactness
export function pow(a: numeric, b: numeric): numeric | undefined {
	if (isExact(a) && isExact(b)) {
		const k = safe(numerator(b));
		const m = safe(b.d);
		if (k === undefined || m === undefined)
			return undefined;
		const root = m === 1 ? a : exactRoot(a, m);
		return root && ipow(root, k);
	}
	const r = Math.pow(toNumber(a), toNumber(b));
	return Number.isFinite(r) ? r : undefined;
}

export function key(n: numeric): string {
	return isExact(n) ? `${numerator(n)}/${n.d}` : `f${n}`;
}

export function toString(n: numeric): string {
	if (isExact(n))
		return n.toFraction();
	return Number.isInteger(n) ? n.toFixed(1) : String(n);
}
