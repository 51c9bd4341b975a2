/**
 * Syntax tree produced by the parser and consumed by the interpreter.
 *
 * Nodes are plain readonly objects discriminated by `kind`; operators keep
 * their token so runtime errors can name the operator and its line.
 */

import type { Token } from './token';
import type { RiteValue } from './values';

export type Expr =
  | { readonly kind: 'literal'; readonly value: RiteValue }
  | { readonly kind: 'grouping'; readonly expression: Expr }
  | { readonly kind: 'unary'; readonly operator: Token; readonly right: Expr }
  | { readonly kind: 'binary'; readonly left: Expr; readonly operator: Token; readonly right: Expr }
  | { readonly kind: 'logical'; readonly left: Expr; readonly operator: Token; readonly right: Expr }
  | { readonly kind: 'variable'; readonly name: Token }
  | { readonly kind: 'assign'; readonly name: Token; readonly value: Expr }
  | { readonly kind: 'postfix'; readonly target: Expr; readonly operator: Token };

export interface BlockStmt {
  readonly kind: 'block';
  readonly statements: readonly Stmt[];
}

export type Stmt =
  | { readonly kind: 'expression'; readonly expression: Expr }
  | { readonly kind: 'print'; readonly expression: Expr }
  | { readonly kind: 'var'; readonly name: Token; readonly initializer: Expr | null }
  | BlockStmt
  | { readonly kind: 'if'; readonly condition: Expr; readonly thenBranch: BlockStmt; readonly elseBranch: BlockStmt | null }
  | { readonly kind: 'while'; readonly condition: Expr; readonly body: BlockStmt };
