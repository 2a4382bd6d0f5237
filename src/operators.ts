import * as num from './rational';
import type { numeric, rational } from './rational';

//-----------------------------------------------------------------------------
// operator table
// filled once when this module loads; defineOperator only ever adds new tags
//-----------------------------------------------------------------------------

export interface OperatorInfo {
	readonly name:			string;
	readonly minArity:		number;
	readonly maxArity:		number;
	readonly associative:	boolean;
	readonly commutative:	boolean;
	readonly identity?:		rational;
	readonly annihilator?:	rational;
	readonly precedence:	number;
	readonly symbol?:		string;
	evaluate(args: readonly number[]): number;
	exact?(args: readonly rational[]): numeric | undefined;
}

export type OperatorDefinition = Partial<OperatorInfo> & Pick<OperatorInfo, 'name' | 'evaluate'>;

export const Precedence = {
	equation:	0,
	additive:	1,
	multiplicative:	2,
	unary:		3,
	power:		4,
	atom:		5,
} as const;

const table = new Map<string, OperatorInfo>();

export function defineOperator(def: OperatorDefinition): OperatorInfo {
	if (table.has(def.name))
		throw new Error(`operator ${def.name} is already defined`);

	const minArity = def.minArity ?? 1;
	const info: OperatorInfo = Object.freeze({
		minArity,
		maxArity:		def.maxArity ?? minArity,
		associative:	false,
		commutative:	false,
		precedence:		Precedence.atom,
		...def,
	});
	table.set(info.name, info);
	return info;
}

export function hasOperator(name: string): boolean {
	return table.has(name);
}

export function operatorInfo(name: string): OperatorInfo {
	const info = table.get(name);
	if (!info)
		throw new Error(`unknown operator ${name}`);
	return info;
}

export function operatorNames(): string[] {
	return [...table.keys()];
}

// fold an operator applied to constants; undefined when the result can't be represented
// exactly (for exact operands) or isn't a finite number (for approximate ones)
export function foldCall(op: string, values: readonly numeric[]): numeric | undefined {
	const info = operatorInfo(op);
	if (values.every(num.isExact))
		return info.exact?.(values);

	const r = info.evaluate(values.map(num.toNumber));
	return Number.isFinite(r) ? r : undefined;
}

//-----------------------------------------------------------------------------
// arithmetic
//-----------------------------------------------------------------------------

defineOperator({
	name:			'add',
	minArity:		2,
	maxArity:		Infinity,
	associative:	true,
	commutative:	true,
	identity:		num.zero,
	precedence:		Precedence.additive,
	symbol:			'+',
	evaluate:		args => args.reduce((a, b) => a + b, 0),
	exact:			args => args.reduce<numeric>((a, b) => num.add(a, b), num.zero),
});

defineOperator({
	name:			'mul',
	minArity:		2,
	maxArity:		Infinity,
	associative:	true,
	commutative:	true,
	identity:		num.one,
	annihilator:	num.zero,
	precedence:		Precedence.multiplicative,
	symbol:			'*',
	evaluate:		args => args.reduce((a, b) => a * b, 1),
	exact:			args => args.reduce<numeric>((a, b) => num.mul(a, b), num.one),
});

defineOperator({
	name:			'sub',
	minArity:		2,
	precedence:		Precedence.additive,
	symbol:			'-',
	evaluate:		([a, b]) => a - b,
	exact:			([a, b]) => num.sub(a, b),
});

defineOperator({
	name:			'div',
	minArity:		2,
	precedence:		Precedence.multiplicative,
	symbol:			'/',
	evaluate:		([a, b]) => a / b,
	exact:			([a, b]) => num.div(a, b),
});

defineOperator({
	name:			'neg',
	precedence:		Precedence.unary,
	symbol:			'-',
	evaluate:		([a]) => -a,
	exact:			([a]) => num.neg(a),
});

defineOperator({
	name:			'pow',
	minArity:		2,
	precedence:		Precedence.power,
	symbol:			'^',
	evaluate:		([a, b]) => Math.pow(a, b),
	exact:			([a, b]) => num.pow(a, b),
});

defineOperator({
	name:			'eq',
	minArity:		2,
	precedence:		Precedence.equation,
	symbol:			'=',
	evaluate:		() => NaN,
});

defineOperator({
	name:			'inner',
	minArity:		2,
	precedence:		Precedence.multiplicative,
	symbol:			'.',
	evaluate:		() => NaN,
});

//-----------------------------------------------------------------------------
// functions
//-----------------------------------------------------------------------------

function unaryFunction(name: string, evaluate: (a: number) => number, exact?: (a: rational) => numeric | undefined) {
	return defineOperator({
		name,
		evaluate:	([a]) => evaluate(a),
		exact:		exact && (([a]) => exact(a)),
	});
}

const whenZero = (value: rational) => (a: rational) => a.n === 0n ? value : undefined;

unaryFunction('sqrt',	Math.sqrt,	a => num.exactRoot(a, 2));
unaryFunction('abs',	Math.abs,	a => a.abs());
unaryFunction('exp',	Math.exp,	whenZero(num.one));
unaryFunction('sin',	Math.sin,	whenZero(num.zero));
unaryFunction('cos',	Math.cos,	whenZero(num.one));
unaryFunction('tan',	Math.tan,	whenZero(num.zero));
unaryFunction('asin',	Math.asin,	whenZero(num.zero));
unaryFunction('acos',	Math.acos,	a => a.equals(num.one) ? num.zero : undefined);
unaryFunction('atan',	Math.atan,	whenZero(num.zero));

// log(a) is natural, log(a, b) is to base b
defineOperator({
	name:		'log',
	minArity:	1,
	maxArity:	2,
	evaluate:	([a, b]) => b === undefined ? Math.log(a) : Math.log(a) / Math.log(b),
	exact:		([a, b]) => {
		if (a.equals(num.one))
			return num.zero;
		if (b === undefined || b.compare(num.zero) <= 0 || b.equals(num.one))
			return undefined;
		// integer power of the base
		for (let k = 1, p = b; k <= 64 && p.abs().compare(a.abs()) <= 0; k++, p = p.mul(b)) {
			if (p.equals(a))
				return num.rational(k);
		}
		return undefined;
	},
});
