import { symbolic, symbolicConstant, symbolicCall, symbolicVector, constValue, type Bindings } from './symbolic';
import { foldCall } from './operators';
import * as num from './rational';
import type { numeric } from './rational';

function foldNode(node: symbolic): symbolic {
	if (node instanceof symbolicVector || !(node instanceof symbolicCall))
		return node;

	const op	= node.op;
	const info	= node.info;
	let args	= node.operands;

	if (op === 'inner') {
		const [a, b] = args;
		return a instanceof symbolicVector && b instanceof symbolicVector ? evaluateConstants(a.inner(b)) : node;
	}

	if (info.associative && info.commutative) {
		args = args.flatMap(i => i.isCall(op) ? i.operands : [i]);

		// vector literals combine elementwise
		if (op === 'add' && args.length > 1 && args.every(i => i instanceof symbolicVector && i.arity === args[0].arity))
			return symbolicVector.create(args[0].operands.map((_, j) => foldNode(symbolicCall.create('add', args.map(v => v.operands[j])))));

		const consts: numeric[] = [];
		const others: symbolic[] = [];
		for (const i of args) {
			const v = constValue(i);
			if (v !== undefined)
				consts.push(v);
			else
				others.push(i);
		}

		if (op === 'mul' && others.length === 1 && others[0] instanceof symbolicVector && consts.length)
			return symbolicVector.create(others[0].operands.map(i => foldNode(symbolicCall.create('mul', [...consts.map(c => symbolicConstant.create(c)), i]))));

		let folded = consts.length > 1 ? foldCall(op, consts) : consts[0];
		if (folded !== undefined) {
			if (info.annihilator && num.isZero(folded) && (num.isExact(folded) || !others.length))
				return symbolicConstant.create(folded);
			if (info.identity && num.isExact(folded) && folded.equals(info.identity) && others.length)
				folded = undefined;
		}

		const result = folded === undefined ? others : [symbolicConstant.create(folded), ...others];
		return	result.length === 0	? symbolicConstant.create(info.identity ?? num.zero)
			:	result.length === 1	? result[0]
			:	node.with(result);
	}

	if (args.every(i => i instanceof symbolicConstant)) {
		const r = foldCall(op, args.map(i => constValue(i) ?? NaN));
		if (r !== undefined)
			return symbolicConstant.create(r);
	}
	return node;
}

// bottom-up constant folding; irrational results of exact operands are left symbolic
export function evaluateConstants(expr: symbolic): symbolic {
	return expr.visit({ post: foldNode });
}

export type EvaluateBindings = Record<string, symbolic | number>;

export function evaluate(expr: symbolic, bindings: EvaluateBindings = {}): symbolic {
	const map: Bindings = {};
	for (const [name, value] of Object.entries(bindings))
		map[name] = value instanceof symbolic ? value : symbolic.from(value);
	return evaluateConstants(expr.substitute(map));
}
