import { Operator, TokenSequence, operandAt, operatorAt } from "../../tokenizer";
import { Expr, NumConst } from "./ast";
import { applyOperator } from "./reduce";

export const precedence: Record<Operator, number> = {
    '^': 3,
    '*': 2,
    '/': 2,
    '+': 1,
    '-': 1
};

// Single pass over the sequence. The right operand is climbed one level
// above the current operator, which keeps equal levels left-associative
// (the same grouping `reduce` produces, `^` included).
export function buildTree(sequence: TokenSequence): Expr {
    let position = 0;

    function operand(): NumConst {
        const value = operandAt(sequence, position);
        position++;
        return { type: 'const', value };
    }

    function climb(minLevel: number): Expr {
        let left: Expr = operand();

        while (position < sequence.length) {
            const op = operatorAt(sequence, position);
            const level = precedence[op];
            if (level < minLevel) {
                break;
            }

            position++;
            const right = climb(level + 1);
            left = { type: 'binop', op, left, right };
        }

        return left;
    }

    return climb(0);
}

export function evaluateTree(e: Expr): number {
    switch (e.type) {
        case 'const':
            return e.value;

        case 'binop':
            return applyOperator(evaluateTree(e.left), e.op, evaluateTree(e.right));
    }
}
