import { Expr } from "./ast";

// Every nested operation gets its own parentheses, so the grouping chosen
// by precedence and associativity is visible: "2 + (3 * 4)".
export function printExpr(e: Expr, nested: boolean = false): string {
    switch (e.type) {
        case 'const':
            return e.value.toString();

        case 'binop': {
            const left = printExpr(e.left, true);
            const right = printExpr(e.right, true);
            const result = `${left} ${e.op} ${right}`;

            return nested ? `(${result})` : result;
        }
    }
}
