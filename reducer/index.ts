export { reduce, applyOperator, precedenceTiers } from "./src/reduce";
export { buildTree, evaluateTree, precedence } from "./src/climb";
export { printExpr } from "./src/printExpr";
export { Expr, NumConst, BinaryOp } from "./src/ast";
