export const OPERATORS = ["^", "*", "/", "+", "-"] as const;

export type Operator = typeof OPERATORS[number];

export interface NumberToken {
    type: "number";
    value: number;
}

export interface OperatorToken {
    type: "operator";
    op: Operator;
}

export type Token = NumberToken | OperatorToken;

// Number, Operator, Number, ..., Number
export type TokenSequence = Token[];

export function isOperator(text: string): text is Operator {
    return OPERATORS.some(op => op === text);
}

export function operandAt(sequence: TokenSequence, index: number): number {
    const token = sequence[index];
    if (token?.type !== "number") {
        throw new Error(`Expected a number at position ${index}`);
    }
    return token.value;
}

export function operatorAt(sequence: TokenSequence, index: number): Operator {
    const token = sequence[index];
    if (token?.type !== "operator") {
        throw new Error(`Expected an operator at position ${index}`);
    }
    return token.op;
}

export function formatSequence(sequence: TokenSequence): string {
    return sequence
        .map(token => token.type === "number" ? String(token.value) : token.op)
        .join(" ");
}
