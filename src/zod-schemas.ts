// SPDX-License-Identifier: MIT
// Session Calculus Zod Schemas
// Single source of truth for the program document (declarations + expression AST).
// Runtime-only types (Value, ClosureVal, etc.) live in types.ts.
//
// Type interfaces are written by hand (not via z.infer) because the expression
// domain is recursive; recursive schemas are annotated with z.ZodType<ExplicitType>
// and reach back into ExprSchema through getters.

import { z } from "zod/v4";

//==============================================================================
// Expression Domain - Manual Interfaces
//==============================================================================

/** Integer literal payload: a JSON number, or a decimal string for big values */
export type IntLiteral = number | string;

/** Multiplicity and type annotations are carried opaquely and never inspected */
export type Annotation = unknown;

export interface UnitExpr { kind: "unit" }
export interface VarExpr { kind: "var"; name: string }
export interface LabelExpr { kind: "label"; name: string }
export interface IntExpr { kind: "int"; value: IntLiteral }
export interface NatExpr { kind: "nat"; value: IntLiteral }

export type ArithKind = "plus" | "minus" | "times" | "div";
export interface ArithExpr { kind: ArithKind; left: Expr; right: Expr }
export interface NegateExpr { kind: "negate"; expr: Expr }
export interface SuccExpr { kind: "succ"; expr: Expr }

export interface LetExpr { kind: "let"; name: string; value: Expr; body: Expr }
export interface LetPairExpr { kind: "letPair"; first: string; second: string; value: Expr; body: Expr }
export interface PairExpr { kind: "pair"; name: string; first: Expr; second: Expr; multiplicity?: Annotation }
export interface FstExpr { kind: "fst"; expr: Expr }
export interface SndExpr { kind: "snd"; expr: Expr }

export interface LambdaExpr { kind: "lambda"; param: string; body: Expr; multiplicity?: Annotation; paramType?: Annotation }
export interface AppExpr { kind: "app"; fn: Expr; arg: Expr }

export interface ForkExpr { kind: "fork"; expr: Expr }
export interface NewExpr { kind: "new"; sessionType?: Annotation }
export interface SendExpr { kind: "send"; channel: Expr }
export interface RecvExpr { kind: "recv"; channel: Expr }

export interface CaseBranch { label: string; body: Expr }
export interface CaseExpr { kind: "case"; scrutinee: Expr; branches: CaseBranch[] }

export interface NatRecExpr {
	kind: "natRec";
	index: Expr;
	zero: Expr;
	counter: string;
	acc: string;
	step: Expr;
	counterType?: Annotation;
	accType?: Annotation;
}

export type Expr =
	| UnitExpr | VarExpr | LabelExpr | IntExpr | NatExpr
	| ArithExpr | NegateExpr | SuccExpr
	| LetExpr | LetPairExpr | PairExpr | FstExpr | SndExpr
	| LambdaExpr | AppExpr
	| ForkExpr | NewExpr | SendExpr | RecvExpr
	| CaseExpr | NatRecExpr;

export type ExprKind = Expr["kind"];

//==============================================================================
// Declaration Domain - Manual Interfaces
//==============================================================================

export interface Param { name: string; multiplicity?: Annotation; type?: Annotation }

export interface FunctionDecl {
	kind: "fun";
	name: string;
	params: Param[];
	body: Expr;
	resultType?: Annotation;
}

/** Surface-language type declaration; accepted and ignored by the evaluator */
export interface TypeDecl { kind: "type"; name: string; definition?: Annotation }

export type Declaration = FunctionDecl | TypeDecl;

export interface Program {
	declarations: Declaration[];
}

//==============================================================================
// Zod Schemas - Expression Domain (21 variants)
//==============================================================================

const Identifier = z.string().min(1);

export const IntLiteralSchema = z.union([
	z.number().int(),
	z.string().regex(/^-?\d+$/, "Expected a decimal integer string"),
]);

export const UnitExprSchema = z.object({ kind: z.literal("unit") });
export const VarExprSchema = z.object({ kind: z.literal("var"), name: Identifier });
export const LabelExprSchema = z.object({ kind: z.literal("label"), name: Identifier });
export const IntExprSchema = z.object({ kind: z.literal("int"), value: IntLiteralSchema });
export const NatExprSchema = z.object({ kind: z.literal("nat"), value: IntLiteralSchema });

export const ArithExprSchema: z.ZodType<ArithExpr> = z.object({
	kind: z.enum(["plus", "minus", "times", "div"]),
	get left() { return ExprSchema; },
	get right() { return ExprSchema; },
});

export const NegateExprSchema: z.ZodType<NegateExpr> = z.object({
	kind: z.literal("negate"),
	get expr() { return ExprSchema; },
});

export const SuccExprSchema: z.ZodType<SuccExpr> = z.object({
	kind: z.literal("succ"),
	get expr() { return ExprSchema; },
});

export const LetExprSchema: z.ZodType<LetExpr> = z.object({
	kind: z.literal("let"),
	name: Identifier,
	get value() { return ExprSchema; },
	get body() { return ExprSchema; },
});

export const LetPairExprSchema: z.ZodType<LetPairExpr> = z.object({
	kind: z.literal("letPair"),
	first: Identifier,
	second: Identifier,
	get value() { return ExprSchema; },
	get body() { return ExprSchema; },
});

export const PairExprSchema: z.ZodType<PairExpr> = z.object({
	kind: z.literal("pair"),
	name: Identifier,
	get first() { return ExprSchema; },
	get second() { return ExprSchema; },
	multiplicity: z.unknown().optional(),
});

export const FstExprSchema: z.ZodType<FstExpr> = z.object({
	kind: z.literal("fst"),
	get expr() { return ExprSchema; },
});

export const SndExprSchema: z.ZodType<SndExpr> = z.object({
	kind: z.literal("snd"),
	get expr() { return ExprSchema; },
});

export const LambdaExprSchema: z.ZodType<LambdaExpr> = z.object({
	kind: z.literal("lambda"),
	param: Identifier,
	get body() { return ExprSchema; },
	multiplicity: z.unknown().optional(),
	paramType: z.unknown().optional(),
});

export const AppExprSchema: z.ZodType<AppExpr> = z.object({
	kind: z.literal("app"),
	get fn() { return ExprSchema; },
	get arg() { return ExprSchema; },
});

export const ForkExprSchema: z.ZodType<ForkExpr> = z.object({
	kind: z.literal("fork"),
	get expr() { return ExprSchema; },
});

export const NewExprSchema = z.object({
	kind: z.literal("new"),
	sessionType: z.unknown().optional(),
});

export const SendExprSchema: z.ZodType<SendExpr> = z.object({
	kind: z.literal("send"),
	get channel() { return ExprSchema; },
});

export const RecvExprSchema: z.ZodType<RecvExpr> = z.object({
	kind: z.literal("recv"),
	get channel() { return ExprSchema; },
});

export const CaseBranchSchema: z.ZodType<CaseBranch> = z.object({
	label: Identifier,
	get body() { return ExprSchema; },
});

export const CaseExprSchema: z.ZodType<CaseExpr> = z.object({
	kind: z.literal("case"),
	get scrutinee() { return ExprSchema; },
	get branches() { return z.array(CaseBranchSchema); },
});

export const NatRecExprSchema: z.ZodType<NatRecExpr> = z.object({
	kind: z.literal("natRec"),
	get index() { return ExprSchema; },
	get zero() { return ExprSchema; },
	counter: Identifier,
	acc: Identifier,
	get step() { return ExprSchema; },
	counterType: z.unknown().optional(),
	accType: z.unknown().optional(),
});

/** Union of all expression variants. Uses z.union (not discriminatedUnion) due to recursion. */
export const ExprSchema: z.ZodType<Expr> = z.union([
	UnitExprSchema,
	VarExprSchema,
	LabelExprSchema,
	IntExprSchema,
	NatExprSchema,
	ArithExprSchema,
	NegateExprSchema,
	SuccExprSchema,
	LetExprSchema,
	LetPairExprSchema,
	PairExprSchema,
	FstExprSchema,
	SndExprSchema,
	LambdaExprSchema,
	AppExprSchema,
	ForkExprSchema,
	NewExprSchema,
	SendExprSchema,
	RecvExprSchema,
	CaseExprSchema,
	NatRecExprSchema,
]);

//==============================================================================
// Zod Schemas - Declarations and Program
//==============================================================================

export const ParamSchema: z.ZodType<Param> = z.object({
	name: Identifier,
	multiplicity: z.unknown().optional(),
	type: z.unknown().optional(),
});

export const FunctionDeclSchema: z.ZodType<FunctionDecl> = z.object({
	kind: z.literal("fun"),
	name: Identifier,
	params: z.array(ParamSchema),
	get body() { return ExprSchema; },
	resultType: z.unknown().optional(),
});

export const TypeDeclSchema: z.ZodType<TypeDecl> = z.object({
	kind: z.literal("type"),
	name: Identifier,
	definition: z.unknown().optional(),
});

export const DeclarationSchema: z.ZodType<Declaration> = z.union([
	FunctionDeclSchema,
	TypeDeclSchema,
]);

export const ProgramSchema: z.ZodType<Program> = z.object({
	declarations: z.array(DeclarationSchema),
});
