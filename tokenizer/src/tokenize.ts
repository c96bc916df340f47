import { readFileSync } from "fs";
import { resolve } from "path";
import * as ohm from "ohm-js";
import { ActionDict, Dict, MatchResult, Node, Semantics } from "ohm-js";
import { ParseError } from "./errors";
import { isOperator, NumberToken, OperatorToken, TokenSequence } from "./tokens";

export const calcGrammar = ohm.grammar(readFileSync(resolve(__dirname, "..", "calc.ohm"), "utf-8"));

export const calcSemantics: CalcSemantics = calcGrammar.createSemantics() as CalcSemantics;

function numberToken(node: Node): NumberToken {
    // "5." is accepted by the grammar and Number() reads it as 5
    return { type: "number", value: Number(node.sourceString) };
}

function operatorToken(node: Node): OperatorToken {
    const op = node.sourceString;
    if (!isOperator(op)) {
        throw new ParseError(`Unknown operator '${op}'`, node.source.sourceString);
    }
    return { type: "operator", op };
}

const calcTokens = {
    Expr(first, operators, operands) {
        const tokens: TokenSequence = [numberToken(first)];
        const rest = operands.children;

        operators.children.forEach((operator, i) => {
            tokens.push(operatorToken(operator), numberToken(rest[i]));
        });

        return tokens;
    }
} satisfies ActionDict<TokenSequence>;

calcSemantics.addOperation<TokenSequence>("tokens()", calcTokens);

export interface CalcDict extends Dict {
    tokens(): TokenSequence;
}

export interface CalcSemantics extends Semantics {
    (match: MatchResult): CalcDict;
}

export function parse(input: string): MatchResult {
    const match = calcGrammar.match(input.trim());

    if (match.failed()) {
        throw new ParseError(match.message ?? "Parse error", input);
    }

    return match;
}

export function tokenize(input: string): TokenSequence {
    return calcSemantics(parse(input)).tokens();
}
