import { ParseError, TokenSequence, formatSequence, tokenize } from "../../tokenizer";
import { buildTree, printExpr, reduce } from "../../reducer";
import { CalcConfig } from "./config";
import { formatResult } from "./format";

export interface EvaluateOptions extends Pick<CalcConfig, "precision" | "parseErrorMessage"> {
    steps: boolean;
    tree: boolean;
}

export function evaluate(source: string): number {
    return reduce(tokenize(source));
}

export function evaluateLine(line: string, options: EvaluateOptions): string[] {
    let sequence: TokenSequence;
    try {
        sequence = tokenize(line);
    } catch (e) {
        if (e instanceof ParseError) {
            return [options.parseErrorMessage];
        }
        throw e;
    }

    const output: string[] = [];

    if (options.tree) {
        output.push(printExpr(buildTree(sequence)));
    }

    const result = reduce(sequence, step => {
        if (options.steps && step.length > 1) {
            output.push(`= ${formatSequence(step)}`);
        }
    });
    output.push(formatResult(result, options.precision));

    return output;
}
