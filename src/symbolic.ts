import * as num from './rational';
import type { numeric, rational } from './rational';
import { operatorInfo, hasOperator, Precedence } from './operators';

// invariants:
// - all symbolic instances are interned and unique by id
// - symbolic instances are immutable, so sub-expressions are freely shared
// - two symbolic instances are structurally equal iff they are the same object
//	- Constants hold an exact rational or an approximate float (never both)
//	- Calls carry an operator tag from the operator table and respect its arity
//	- Vectors of vectors are matrices, and all rows have the same length

class Interner<T extends object> {
	private table = new Map<string, WeakRef<T>>();
	private finalizer = new FinalizationRegistry((key: string) => {
		const ref = this.table.get(key);
		if (ref && !ref.deref())
			this.table.delete(key);
	});

	intern<U extends T>(key: string, factory: (key: string) => U): U {
		const got = this.table.get(key)?.deref();
		if (got)
			return got as U;
		const value = factory(key);
		this.table.set(key, new WeakRef(value));
		this.finalizer.register(value, key);
		return value;
	}

	get size(): number {
		return this.table.size;
	}
}

export type Bindings = Record<string, symbolic>;

export interface Visitor {
	noRemake?:	boolean;
	pre?:		(node: symbolic, parent?: symbolic) => symbolic | undefined;
	post?:		(node: symbolic, parent?: symbolic) => symbolic | undefined;
}

function visit(node: symbolic, recurse: () => symbolic, visitor: Visitor, parent?: symbolic): symbolic {
	function postvisit(node: symbolic): symbolic {
		return visitor.post?.(node, parent) ?? node;
	}
	if (visitor.pre) {
		const n = visitor.pre(node, parent);
		if (!n)
			return node;
		if (n !== node)
			return postvisit(n);
	}
	if (visitor.noRemake) {
		for (const child of node.operands)
			child.visit(visitor, node);
	} else {
		node = recurse();
	}
	return postvisit(node);
}

export interface StringifyOptions {
	style:		'infix' | 'prefix';
	mulChar:	string;
	divChar:	string;
	addChar:	string;
	subChar:	string;
	printConst:	(n: numeric) => string;
}

const StringifyOptionsDefault: StringifyOptions = {
	style:		'infix',
	mulChar:	' * ',
	divChar:	' / ',
	addChar:	' + ',
	subChar:	' - ',
	printConst:	n => num.toString(n),
};

// nested-array form: ['*', 'a', 3, 4], ['=', ['+', 1, 'x'], 3], [1, 2, 3] (a vector)
export type ListForm = number | string | rational | symbolic | readonly ListForm[];

const listOps: Record<string, string> = {
	'+':	'add',
	'*':	'mul',
	'-':	'sub',
	'/':	'div',
	'^':	'pow',
	'**':	'pow',
	'=':	'eq',
	'.':	'inner',
};

type param = number | rational | symbolic;

function asSymbolic(i: param): symbolic {
	return i instanceof symbolic ? i : symbolic.from(i);
}

//-----------------------------------------------------------------------------
// symbolic
//-----------------------------------------------------------------------------

export abstract class symbolic {
	static interner		= new Interner<symbolic>();
	static defStringify	= StringifyOptionsDefault;
	static traceDepth	= 0;
	static traceLogging	= false;

	static setDefaultStringifyOptions(opts: Partial<StringifyOptions>) {
		this.defStringify = { ...this.defStringify, ...opts };
	}

	static setTraceLogging(enabled: boolean) {
		this.traceLogging = enabled;
	}
	// returns the matching outdent; call it when the traced step is finished
	static trace(log: () => string): () => void {
		if (this.traceLogging) {
			console.log('  '.repeat(this.traceDepth++) + log());
			return () => { this.traceDepth--; };
		}
		return () => {};
	}

	// integers given as javascript numbers are exact; other numbers are approximate
	static from(i: number | rational): symbolic {
		return symbolicConstant.create(typeof i === 'number' && Number.isInteger(i) ? num.rational(i) : i);
	}
	static variable(name: string): symbolic {
		return symbolicVariable.create(name);
	}
	static bind(name: string): symbolic {
		return symbolicMatcher.create(name);
	}
	static call(op: string, ...operands: param[]): symbolic {
		return symbolicCall.create(op, operands.map(asSymbolic));
	}
	static vector(...items: param[]): symbolic {
		return symbolicVector.create(items.map(asSymbolic));
	}
	static list(form: ListForm): symbolic {
		if (form instanceof symbolic)
			return form;
		if (typeof form === 'number' || num.isRational(form))
			return symbolic.from(form);
		if (typeof form === 'string')
			return form === 'pi' ? pi : form === 'e' ? e : symbolic.variable(form);

		const [head, ...rest] = form;
		if (typeof head === 'string' && (head in listOps || hasOperator(head))) {
			const op = listOps[head] ?? head;
			const operands = rest.map(i => symbolic.list(i));
			return op === 'sub' && operands.length === 1
				? symbolicCall.create('neg', operands)
				: symbolicCall.create(op, operands);
		}
		return symbolicVector.create(form.map(i => symbolic.list(i)));
	}

	static get zero():	symbolic	{ return zero; }
	static get one():	symbolic	{ return one; }
	static get pi():	symbolic	{ return pi; }
	static get e():		symbolic	{ return e; }

	static sqrt(i: param):	symbolic	{ return symbolic.call('sqrt', i); }
	static exp(i: param):	symbolic	{ return symbolic.call('exp', i); }
	static log(i: param, base?: param): symbolic {
		return base === undefined ? symbolic.call('log', i) : symbolic.call('log', i, base);
	}
	static abs(i: param):	symbolic	{ return symbolic.call('abs', i); }
	static sin(i: param):	symbolic	{ return symbolic.call('sin', i); }
	static cos(i: param):	symbolic	{ return symbolic.call('cos', i); }
	static tan(i: param):	symbolic	{ return symbolic.call('tan', i); }

	private _size?:	number;
	private _free?:	ReadonlySet<string>;

	constructor(public readonly id: string) {}

	is<T extends keyof typeof types>(type: T): this is InstanceType<(typeof types)[T]> {
		return this instanceof types[type];
	}
	isCall(op?: string): this is symbolicCall {
		return false;
	}
	isConst(_value?: number): boolean {
		return false;
	}

	get op(): string | undefined				{ return undefined; }
	get operands(): readonly symbolic[]		{ return []; }
	get arity(): number						{ return this.operands.length; }

	eq(b: symbolic): boolean				{ return this === b; }

	contains(v: symbolic): boolean {
		return this === v || this.operands.some(i => i.contains(v));
	}
	occurrences(v: symbolic): number {
		return this === v ? 1 : this.operands.reduce((n, i) => n + i.occurrences(v), 0);
	}
	freeVariables(): ReadonlySet<string> {
		if (!this._free) {
			const vars = new Set<string>();
			for (const i of this.operands)
				i.freeVariables().forEach(v => vars.add(v));
			this._free = vars;
		}
		return this._free;
	}
	size(): number {
		return this._size ??= this.operands.reduce((n, i) => n + i.size(), 1);
	}

	substitute(_map: Bindings):	symbolic	{ return this; }
	replace(from: symbolic, to: symbolic): symbolic {
		return this.visit({ pre: node => node === from ? to : node });
	}
	visit(visitor: Visitor, parent?: symbolic): symbolic {
		return visit(this, () => this, visitor, parent);
	}
	match(node: symbolic, bindings: Bindings): Bindings | null {
		return node === this ? bindings : null;
	}

	evaluate(_env?: Record<string, number>): number	{ return NaN; }

	// structural builders: no folding or reordering happens here
	add(b: param):		symbolic	{ return symbolicCall.create('add', [this, asSymbolic(b)]); }
	sub(b: param):		symbolic	{ return symbolicCall.create('sub', [this, asSymbolic(b)]); }
	mul(b: param):		symbolic	{ return symbolicCall.create('mul', [this, asSymbolic(b)]); }
	div(b: param):		symbolic	{ return symbolicCall.create('div', [this, asSymbolic(b)]); }
	pow(b: param):		symbolic	{ return symbolicCall.create('pow', [this, asSymbolic(b)]); }
	neg():				symbolic	{ return symbolicCall.create('neg', [this]); }
	equals(b: param):	symbolic	{ return symbolicCall.create('eq', [this, asSymbolic(b)]); }

	get precedence(): number	{ return Precedence.atom; }

	abstract _toString(opts: StringifyOptions): string;
	toString(opts?: Partial<StringifyOptions>): string	{ return this._toString({ ...symbolic.defStringify, ...opts }); }
}

//-----------------------------------------------------------------------------
// constant
//-----------------------------------------------------------------------------

export class symbolicConstant extends symbolic {
	static create(value: numeric) {
		return this.interner.intern(`c:${num.key(value)}`, id => new symbolicConstant(id, value));
	}

	constructor(id: string, public readonly value: numeric) {
		super(id);
	}

	get exact(): boolean	{ return num.isExact(this.value); }

	isConst(value?: number): boolean {
		return value === undefined || (num.isExact(this.value) ? this.value.equals(value) : this.value === value);
	}
	evaluate(): number					{ return num.toNumber(this.value); }

	get precedence(): number {
		return num.sign(this.value) < 0 ? Precedence.unary
			: num.isExact(this.value) && !num.isInteger(this.value) ? Precedence.multiplicative
			: Precedence.atom;
	}
	_toString(opts: StringifyOptions)	{ return opts.printConst(this.value); }
}

// a float constant, even for integral values
export function approx(value: number): symbolic {
	return symbolicConstant.create(value);
}

const zero		= symbolic.from(0);
const one		= symbolic.from(1);
const minusOne	= symbolic.from(-1);

export function constValue(e: symbolic): numeric | undefined {
	return e instanceof symbolicConstant ? e.value : undefined;
}

//-----------------------------------------------------------------------------
// named constants
//-----------------------------------------------------------------------------

export class symbolicNamed extends symbolic {
	static create(name: string, value: number, display = name) {
		return this.interner.intern(`n:${name}`, id => new symbolicNamed(id, name, value, display));
	}

	constructor(id: string, public readonly name: string, public readonly value: number, private display: string) {
		super(id);
	}
	evaluate(): number		{ return this.value; }
	_toString(): string		{ return this.display; }
}

const pi	= symbolicNamed.create('pi', Math.PI, 'π');
const e		= symbolicNamed.create('e', Math.E, '𝑒');

//-----------------------------------------------------------------------------
// variable
//-----------------------------------------------------------------------------

export class symbolicVariable extends symbolic {
	static create(name: string)	{ return this.interner.intern(`v:${name}`, id => new symbolicVariable(id, name)); }

	constructor(id: string, public readonly name: string) {
		super(id);
	}
	freeVariables(): ReadonlySet<string> {
		return new Set([this.name]);
	}
	substitute(map: Bindings): symbolic {
		return map[this.name] ?? this;
	}
	evaluate(env?: Record<string, number>): number {
		return env?.[this.name] ?? NaN;
	}
	_toString(): string		{ return this.name; }
}

export class symbolicMatcher extends symbolicVariable {
	static create(name: string)	{ return this.interner.intern(`*:${name}`, id => new symbolicMatcher(id, name)); }

	substitute(map: Bindings): symbolic {
		return map[this.name] ?? this;
	}
	match(node: symbolic, bindings: Bindings): Bindings | null {
		const got = bindings[this.name];
		if (got)
			return got === node ? bindings : null;

		symbolic.trace(() => `bound ${this.name} to ${node}`)();
		return { ...bindings, [this.name]: node };
	}
	_toString(): string		{ return `?${this.name}`; }
}

//-----------------------------------------------------------------------------
// call
//-----------------------------------------------------------------------------

function matchOperands(patterns: readonly symbolic[], nodes: readonly symbolic[], bindings: Bindings): Bindings | null {
	let bs: Bindings | null = bindings;
	for (let i = 0; bs && i < patterns.length; i++)
		bs = patterns[i].match(nodes[i], bs);
	return bs;
}

export class symbolicCall extends symbolic {
	static validate(op: string, operands: readonly symbolic[]) {
		const info = operatorInfo(op);
		if (operands.length < info.minArity || operands.length > info.maxArity)
			throw new Error(`${op} takes ${info.minArity === info.maxArity ? info.minArity : `${info.minArity}..${info.maxArity}`} operands, got ${operands.length}`);
	}
	static create(op: string, operands: readonly symbolic[]): symbolicCall {
		this.validate(op, operands);
		return this.interner.intern(`${op}(${operands.map(i => i.id).join(',')})`, id => new symbolicCall(id, op, operands));
	}

	constructor(id: string, private readonly tag: string, private readonly args: readonly symbolic[]) {
		super(id);
	}

	isCall(op?: string): this is symbolicCall {
		return op === undefined || op === this.tag;
	}
	get op(): string						{ return this.tag; }
	get operands(): readonly symbolic[]	{ return this.args; }
	get info()								{ return operatorInfo(this.tag); }

	with(operands: readonly symbolic[]): symbolicCall {
		return operands.every((i, n) => i === this.args[n]) && operands.length === this.args.length
			? this
			: symbolicCall.create(this.tag, operands);
	}

	substitute(map: Bindings): symbolic {
		return this.with(this.args.map(i => i.substitute(map)));
	}
	visit(visitor: Visitor, parent?: symbolic): symbolic {
		return visit(this, () => this.with(this.args.map(i => i.visit(visitor, this))), visitor, parent);
	}

	match(node: symbolic, bindings: Bindings): Bindings | null {
		if (!(node instanceof symbolicCall) || node.tag !== this.tag)
			return null;

		const done = symbolic.trace(() => `${this.tag}: ${this} vs ${node}`);
		try {
			if (!this.info.commutative)
				return node.args.length === this.args.length ? matchOperands(this.args, node.args, bindings) : null;

			// Backtracking matcher: pair each pattern operand with a distinct node operand so that all bindings stay consistent;
			// for associative operators, unpaired node operands are bound to _rest
			if (node.args.length < this.args.length || (!this.info.associative && node.args.length !== this.args.length))
				return null;

			const tryMatch = (pIdx: number, remaining: readonly symbolic[], bs: Bindings): Bindings | null => {
				if (pIdx === this.args.length) {
					if (remaining.length === 0)
						return bs;
					return { ...bs, _rest: remaining.length === 1 ? remaining[0] : symbolicCall.create(this.tag, remaining) };
				}
				for (let i = 0; i < remaining.length; i++) {
					const got = this.args[pIdx].match(remaining[i], bs);
					if (got) {
						const result = tryMatch(pIdx + 1, [...remaining.slice(0, i), ...remaining.slice(i + 1)], got);
						if (result)
							return result;
					}
				}
				return null;
			};
			return tryMatch(0, node.args, bindings);

		} finally {
			done();
		}
	}

	evaluate(env?: Record<string, number>): number {
		return this.info.evaluate(this.args.map(i => i.evaluate(env)));
	}

	get precedence(): number	{ return this.info.precedence; }

	_toString(opts: StringifyOptions): string {
		const info = this.info;
		if (opts.style === 'prefix')
			return `(${info.symbol ?? this.tag} ${this.args.map(i => i._toString(opts)).join(' ')})`;

		const wrap = (i: symbolic, tight = false) => {
			const s = i._toString(opts);
			return i.precedence < info.precedence || (tight && i.precedence === info.precedence) ? `(${s})` : s;
		};
		switch (this.tag) {
			case 'add':	return this.args.map(i => wrap(i)).join(opts.addChar);
			case 'mul':	return this.args.map(i => wrap(i)).join(opts.mulChar);
			case 'sub':	return `${wrap(this.args[0])}${opts.subChar}${wrap(this.args[1], true)}`;
			case 'div':	return `${wrap(this.args[0])}${opts.divChar}${wrap(this.args[1], true)}`;
			case 'neg':	return `-${wrap(this.args[0], true)}`;
			case 'pow':	return `${wrap(this.args[0], true)}^${wrap(this.args[1], true)}`;
			case 'eq':	return `${wrap(this.args[0])} = ${wrap(this.args[1])}`;
			default:	return `${this.tag}(${this.args.map(i => i._toString(opts)).join(', ')})`;
		}
	}
}

//-----------------------------------------------------------------------------
// vector
//-----------------------------------------------------------------------------

export class symbolicVector extends symbolic {
	static validate(items: readonly symbolic[]) {
		const rows = items.filter(i => i instanceof symbolicVector);
		if (rows.length && (rows.length !== items.length || rows.some(r => r.arity !== rows[0].arity)))
			throw new Error('matrix rows must all be vectors of the same length');
	}
	static create(items: readonly symbolic[]): symbolicVector {
		this.validate(items);
		return this.interner.intern(`[${items.map(i => i.id).join(',')}]`, id => new symbolicVector(id, items));
	}

	constructor(id: string, private readonly items: readonly symbolic[]) {
		super(id);
	}

	get operands(): readonly symbolic[]	{ return this.items; }
	get isMatrix(): boolean					{ return this.items.length > 0 && this.items[0] instanceof symbolicVector; }

	substitute(map: Bindings): symbolic {
		return symbolicVector.create(this.items.map(i => i.substitute(map)));
	}
	visit(visitor: Visitor, parent?: symbolic): symbolic {
		return visit(this, () => symbolicVector.create(this.items.map(i => i.visit(visitor, this))), visitor, parent);
	}
	match(node: symbolic, bindings: Bindings): Bindings | null {
		return node instanceof symbolicVector && node.items.length === this.items.length
			? matchOperands(this.items, node.items, bindings)
			: null;
	}

	rows(): symbolic[][] {
		return this.items.map(i => i instanceof symbolicVector ? [...i.items] : [i]);
	}

	// vector.vector, matrix.vector, vector.matrix and matrix.matrix
	inner(b: symbolicVector): symbolic {
		const dot = (x: readonly symbolic[], y: readonly symbolic[]) => {
			if (x.length !== y.length)
				throw new Error(`inner product of lengths ${x.length} and ${y.length}`);
			return sum(...x.map((xi, i) => product(xi, y[i])));
		};
		const columns = (m: symbolicVector) => m.items[0].operands.map((_, j) => m.items.map(row => row.operands[j]));

		if (!this.isMatrix && !b.isMatrix)
			return dot(this.items, b.items);
		if (this.isMatrix && !b.isMatrix)
			return symbolicVector.create(this.items.map(row => dot(row.operands, b.items)));
		if (!this.isMatrix)
			return symbolicVector.create(columns(b).map(col => dot(this.items, col)));
		const cols = columns(b);
		return symbolicVector.create(this.items.map(row => symbolicVector.create(cols.map(col => dot(row.operands, col)))));
	}

	_toString(opts: StringifyOptions): string {
		return `[${this.items.map(i => i._toString(opts)).join(', ')}]`;
	}
}

export function compareNumeric(a: numeric, b: numeric): number {
	return num.compare(a, b) || (num.isExact(a) === num.isExact(b) ? 0 : num.isExact(a) ? -1 : 1);
}

//-----------------------------------------------------------------------------
// ordering
// constants < named constants < variables < calls < vectors
//-----------------------------------------------------------------------------

function rank(a: symbolic): number {
	return	a instanceof symbolicConstant ? 0
		:	a instanceof symbolicNamed ? 1
		:	a instanceof symbolicVariable ? 2
		:	a instanceof symbolicCall ? 3
		:	4;
}

export function compareSymbolic(a: symbolic, b: symbolic): number {
	if (a === b)
		return 0;
	const r = rank(a) - rank(b);
	if (r)
		return r;

	if (a instanceof symbolicConstant && b instanceof symbolicConstant)
		return compareNumeric(a.value, b.value);
	if ((a instanceof symbolicNamed && b instanceof symbolicNamed) || (a instanceof symbolicVariable && b instanceof symbolicVariable))
		return a.name < b.name ? -1 : a.name > b.name ? 1 : a.id < b.id ? -1 : 1;

	if (a.op !== b.op)
		return (a.op ?? '') < (b.op ?? '') ? -1 : 1;

	const n = Math.min(a.arity, b.arity);
	for (let i = 0; i < n; i++) {
		const c = compareSymbolic(a.operands[i], b.operands[i]);
		if (c)
			return c;
	}
	return a.arity - b.arity;
}

//-----------------------------------------------------------------------------
// minimal builders
// these only drop exact identities and flatten, they never reorder
//-----------------------------------------------------------------------------

function isExactConst(e: symbolic, value: number): boolean {
	return e instanceof symbolicConstant && e.exact && e.isConst(value);
}

export function sum(...terms: symbolic[]): symbolic {
	const flat = terms.flatMap(i => i.isCall('add') ? i.operands : [i]).filter(i => !isExactConst(i, 0));
	return flat.length === 0 ? zero : flat.length === 1 ? flat[0] : symbolicCall.create('add', flat);
}

export function product(...factors: symbolic[]): symbolic {
	const flat = factors.flatMap(i => i.isCall('mul') ? i.operands : [i]);
	if (flat.some(i => isExactConst(i, 0)))
		return zero;
	const kept = flat.filter(i => !isExactConst(i, 1));
	return kept.length === 0 ? one : kept.length === 1 ? kept[0] : symbolicCall.create('mul', kept);
}

export function power(base: symbolic, exponent: symbolic): symbolic {
	return isExactConst(exponent, 0) ? one : isExactConst(exponent, 1) ? base : symbolicCall.create('pow', [base, exponent]);
}

export function negate(a: symbolic): symbolic {
	const v = constValue(a);
	return v !== undefined ? symbolicConstant.create(num.neg(v)) : product(minusOne, a);
}

export function difference(a: symbolic, b: symbolic): symbolic {
	return isExactConst(b, 0) ? a : isExactConst(a, 0) ? negate(b) : symbolicCall.create('sub', [a, b]);
}

export function quotient(a: symbolic, b: symbolic): symbolic {
	return isExactConst(b, 1) ? a : isExactConst(a, 0) && !b.isConst(0) ? zero : symbolicCall.create('div', [a, b]);
}

export function call(op: string, ...operands: symbolic[]): symbolic {
	return symbolicCall.create(op, operands);
}

const types = {
	const:		symbolicConstant,
	named:		symbolicNamed,
	var:		symbolicVariable,
	matcher:	symbolicMatcher,
	call:		symbolicCall,
	vector:		symbolicVector,
} as const;
