import { Operator, TokenSequence, operandAt, operatorAt } from "../../tokenizer";

// Highest tier first; operators inside a tier are matched by the same scan.
export const precedenceTiers: readonly (readonly Operator[])[] = [
    ["^"],
    ["*", "/"],
    ["+", "-"]
];

export function applyOperator(left: number, op: Operator, right: number): number {
    switch (op) {
        case "^":
            return left ** right;
        case "*":
            return left * right;
        case "/":
            // 1 / 0 is Infinity, 0 / 0 is NaN; both go back to the caller as values
            return left / right;
        case "+":
            return left + right;
        case "-":
            return left - right;
    }
}

function findOperator(sequence: TokenSequence, tier: readonly Operator[]): number {
    return sequence.findIndex(token => token.type === "operator" && tier.includes(token.op));
}

/**
 * Collapses the sequence in place, one (operand, operator, operand) window at a time.
 * Within a tier the leftmost operator always goes first, so every operator,
 * `^` included, is left-associative: "2 ^ 3 ^ 2" is (2 ^ 3) ^ 2 = 64.
 *
 * The sequence must come from `tokenize`; nothing is validated here.
 */
export function reduce(sequence: TokenSequence, onReduce?: (sequence: TokenSequence) => void): number {
    if (sequence.length === 1) {
        return operandAt(sequence, 0);
    }

    for (const tier of precedenceTiers) {
        let index = findOperator(sequence, tier);

        while (index !== -1) {
            const result = applyOperator(
                operandAt(sequence, index - 1),
                operatorAt(sequence, index),
                operandAt(sequence, index + 1)
            );
            sequence.splice(index - 1, 3, { type: "number", value: result });
            onReduce?.(sequence);

            index = findOperator(sequence, tier);
        }
    }

    return operandAt(sequence, 0);
}
