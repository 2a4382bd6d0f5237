import { symbolic, symbolicConstant, symbolicVariable, constValue, sum, product, difference, quotient, negate, type Bindings } from './symbolic';
import { canonical } from './canonical';
import { multiplyOut } from './expand';
import { ok, fail, type Result } from './result';
import * as num from './rational';

//-----------------------------------------------------------------------------
// placeholders for free parameters: _0, _1, ...
//-----------------------------------------------------------------------------

export class Placeholders {
	constructor(public readonly prefix = '_', private counter = 0) {}

	next(): symbolicVariable {
		return symbolicVariable.create(`${this.prefix}${this.counter++}`);
	}
	get count(): number {
		return this.counter;
	}
}

//-----------------------------------------------------------------------------
// linear forms
//-----------------------------------------------------------------------------

export interface LinearForm {
	coefficients:	symbolic[];		// one per unknown
	constant:		symbolic;
}

// expr as Σ coefficients[i]·unknowns[i] + constant, with no unknown in any coefficient
export function linearCoefficients(unknowns: readonly symbolic[], expr: symbolic): Result<LinearForm, 'NotLinear'> {
	const expanded	= multiplyOut(expr);
	const terms		= expanded.isCall('add') ? expanded.operands : [expanded];
	const coefs		= unknowns.map((): symbolic[] => []);
	const constant: symbolic[] = [];

	for (const term of terms) {
		const factors	= term.isCall('mul') ? term.operands : [term];
		const involved	= factors.filter(f => unknowns.some(u => f.contains(u)));
		if (involved.length === 0) {
			constant.push(term);
			continue;
		}
		const i = unknowns.indexOf(involved[0]);
		if (involved.length > 1 || i < 0)
			return fail('NotLinear', `${term} is not linear in ${unknowns.join(', ')}`);
		coefs[i].push(product(...factors.filter(f => f !== involved[0])));
	}

	return ok({
		coefficients:	coefs.map(c => canonical(sum(...c))),
		constant:		canonical(sum(...constant)),
	});
}

//-----------------------------------------------------------------------------
// Gauss-Jordan elimination
//-----------------------------------------------------------------------------

export interface LinearOptions {
	placeholders:	Placeholders;
}

function reduce(e: symbolic): symbolic {
	return canonical(multiplyOut(e));
}

// exact constants first, then approximate ones, then anything not known to be zero
function pivotRank(e: symbolic): number {
	const v = constValue(e);
	return v === undefined ? 2 : num.isZero(v) ? Infinity : num.isExact(v) ? 0 : 1;
}

// solves residuals (each meaning residual = 0) for the unknowns; free unknowns are given placeholders
export function solveLinear(unknowns: readonly symbolic[], residuals: readonly symbolic[], options: Partial<LinearOptions> = {}): Result<Bindings, 'InconsistentSystem' | 'NotLinear' | 'UnsolvableStrategy'> {
	const placeholders = options.placeholders ?? new Placeholders();
	const names: string[] = [];
	for (const u of unknowns) {
		if (!(u instanceof symbolicVariable))
			throw new Error(`unknown ${u} is not a variable`);
		names.push(u.name);
	}

	// rows of [a0 ... an-1 | b] for Σ ai·xi = b
	const rows: symbolic[][] = [];
	for (const r of residuals) {
		const form = linearCoefficients(unknowns, r);
		if (!form.ok)
			return form;
		rows.push([...form.value.coefficients, reduce(negate(form.value.constant))]);
	}

	const n = unknowns.length;
	const pivots: number[] = [];		// pivot column of each reduced row
	let row = 0;

	for (let col = 0; col < n && row < rows.length; col++) {
		let best = -1;
		for (let i = row; i < rows.length; i++) {
			if (pivotRank(rows[i][col]) < (best < 0 ? Infinity : pivotRank(rows[best][col])))
				best = i;
		}
		if (best < 0)
			continue;

		[rows[row], rows[best]] = [rows[best], rows[row]];
		const pivot = rows[row][col];
		rows[row] = rows[row].map(e => reduce(quotient(e, pivot)));

		for (let i = 0; i < rows.length; i++) {
			const f = rows[i][col];
			if (i !== row && !f.isConst(0))
				rows[i] = rows[i].map((e, j) => reduce(difference(e, product(f, rows[row][j]))));
		}
		pivots.push(col);
		row++;
	}

	// rows past the last pivot read 0 = b
	for (let i = row; i < rows.length; i++) {
		const b = rows[i][n];
		if (!(b instanceof symbolicConstant))
			return fail('UnsolvableStrategy', `0 = ${b} remains after elimination`);
		if (!num.isZero(b.value))
			return fail('InconsistentSystem', `0 = ${b} after elimination`);
	}

	const free = new Map<number, symbolic>();
	for (let col = 0; col < n; col++) {
		if (!pivots.includes(col))
			free.set(col, placeholders.next());
	}

	const result: Bindings = {};
	for (const [col, p] of free)
		result[names[col]] = p;

	pivots.forEach((col, i) => {
		const terms = [rows[i][n]];
		for (const [j, p] of free)
			terms.push(negate(product(rows[i][j], p)));
		result[names[col]] = reduce(sum(...terms));
	});
	return ok(result);
}
