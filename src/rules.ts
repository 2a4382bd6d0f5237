import { symbolic, symbolicConstant, sum, product, power, call, type Bindings } from './symbolic';
import * as num from './rational';

//-----------------------------------------------------------------------------
// rules
//-----------------------------------------------------------------------------

export type Rule = {
	name:		string;
	pattern:	symbolic;
	replace:	(bs: Bindings) => symbolic;
	guard?:		(bs: Bindings) => boolean;
};

// operands of an associative pattern that are not matched end up in _rest, and are put back around the replacement
export function PatternRule(name: string, pattern: symbolic, replace: (bs: Bindings) => symbolic, guard?: (bs: Bindings) => boolean): Rule {
	const rejoin	= pattern.isCall('add') ? sum : pattern.isCall('mul') ? product : undefined;
	return {
		name,
		pattern,
		replace: bs => {
			const r = replace(bs);
			return rejoin && bs._rest ? rejoin(r, bs._rest) : r;
		},
		guard,
	};
}

export function applyRule(rule: Rule, node: symbolic): symbolic | undefined {
	const bs = rule.pattern.match(node, {});
	if (!bs || (rule.guard && !rule.guard(bs)))
		return undefined;
	const result = rule.replace(bs);
	return result === node ? undefined : result;
}

// first rule that rewrites node
export function applyRules(node: symbolic, rules: readonly Rule[]): symbolic | undefined {
	for (const rule of rules) {
		const result = applyRule(rule, node);
		if (result) {
			symbolic.trace(() => `rule ${rule.name}: ${node} → ${result}`)();
			return result;
		}
	}
	return undefined;
}

//-----------------------------------------------------------------------------
// step budget shared by every fixpoint loop of one operation
//-----------------------------------------------------------------------------

export class Budget {
	used = 0;
	constructor(public readonly max: number) {}

	get exhausted(): boolean {
		return this.used >= this.max;
	}
	// false once the budget is used up
	spend(steps = 1): boolean {
		this.used += steps;
		return !this.exhausted;
	}
}

//-----------------------------------------------------------------------------
// simplification rules
// patterns are in canonical form: no sub, neg, div or sqrt
//-----------------------------------------------------------------------------

const A		= symbolic.bind('A');
const B		= symbolic.bind('B');
const K		= symbolic.bind('K');

function isEvenInteger(e: symbolic): boolean {
	return e instanceof symbolicConstant && num.isEven(e.value);
}

export const simplifyRules: Rule[] = [
	// exp and log are inverses (on the reals)
	PatternRule('exp∘log',
		symbolic.exp(symbolic.log(A)),
		bs => bs.A
	),
	PatternRule('log∘exp',
		symbolic.log(symbolic.exp(A)),
		bs => bs.A
	),
	// exp(K·log A) → A^K
	PatternRule('exp∘(K·log)',
		symbolic.exp(symbolic.call('mul', K, symbolic.log(A))),
		bs => power(bs.A, bs._rest ? product(bs.K, bs._rest) : bs.K)
	),
	PatternRule('exp^B',
		symbolic.call('pow', symbolic.exp(A), B),
		bs => symbolic.exp(product(bs.A, bs.B))
	),
	PatternRule('exp·exp',
		symbolic.call('mul', symbolic.exp(A), symbolic.exp(B)),
		bs => symbolic.exp(sum(bs.A, bs.B))
	),

	PatternRule('abs∘abs',
		symbolic.abs(symbolic.abs(A)),
		bs => symbolic.abs(bs.A)
	),
	PatternRule('abs∘exp',
		symbolic.abs(symbolic.exp(A)),
		bs => symbolic.exp(bs.A)
	),
	PatternRule('abs(A^even)',
		symbolic.abs(symbolic.call('pow', A, K)),
		bs => power(bs.A, bs.K),
		bs => isEvenInteger(bs.K)
	),

	// sin²A + cos²A → 1
	PatternRule('sin²+cos²',
		symbolic.call('add', symbolic.call('pow', symbolic.sin(A), 2), symbolic.call('pow', symbolic.cos(A), 2)),
		() => symbolic.one
	),
	PatternRule('sin∘asin',
		symbolic.sin(call('asin', A)),
		bs => bs.A
	),
	PatternRule('cos∘acos',
		symbolic.cos(call('acos', A)),
		bs => bs.A
	),
	PatternRule('tan∘atan',
		symbolic.tan(call('atan', A)),
		bs => bs.A
	),
];
