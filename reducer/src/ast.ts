import { Operator } from "../../tokenizer";

export type Expr =
    | NumConst
    | BinaryOp;

export interface NumConst {
    type: 'const';
    value: number;
}

export interface BinaryOp {
    type: 'binop';
    op: Operator;
    left: Expr;
    right: Expr;
}
