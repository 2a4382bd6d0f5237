import { symbolic } from './symbolic';
import { canonical } from './canonical';
import { multiplyOut } from './expand';
import { Budget, simplifyRules, type Rule } from './rules';
import { ok, fail, type Result } from './result';

export interface SimplifyOptions {
	ratio:		number;				// result may be at most this many times the size of the input
	maxSteps:	number;				// rewrite steps before giving up
	rules:		readonly Rule[];	// extra rules, tried after the built-in ones
	expand:		boolean;			// also try multiplying out, keeping it when smaller
}

let defaultOptions: SimplifyOptions = {
	ratio:		4,
	maxSteps:	10000,
	rules:		[],
	expand:		true,
};

export function setDefaultSimplifyOptions(opts: Partial<SimplifyOptions>) {
	defaultOptions = { ...defaultOptions, ...opts };
}

export function getDefaultSimplifyOptions(): Readonly<SimplifyOptions> {
	return defaultOptions;
}

export function trySimplify(expr: symbolic, options?: Partial<SimplifyOptions>): Result<symbolic, 'RatioNotMet'> {
	const opts		= { ...defaultOptions, ...options };
	const rules		= [...simplifyRules, ...opts.rules];
	const budget	= new Budget(opts.maxSteps);

	const done = symbolic.trace(() => `simplify ${expr}`);
	try {
		let result = canonical(expr, rules, budget);

		if (opts.expand && !budget.exhausted) {
			const expanded = canonical(multiplyOut(result, { budget }), rules, budget);
			if (expanded.size() < result.size())
				result = expanded;
		}

		if (budget.exhausted)
			return fail('RatioNotMet', `step budget of ${opts.maxSteps} used up simplifying ${expr}`);

		if (result.size() > opts.ratio * expr.size())
			return fail('RatioNotMet', `${result} is more than ${opts.ratio} times the size of ${expr}`);

		return ok(result);
	} finally {
		done();
	}
}

export function simplify(expr: symbolic, options?: Partial<SimplifyOptions>): symbolic | undefined {
	const r = trySimplify(expr, options);
	return r.ok ? r.value : undefined;
}
