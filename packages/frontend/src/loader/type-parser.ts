/**
 * Parser for the compact type notation used in program documents
 *
 *   !                      absurd
 *   Uninit<8>              uninitialized, 8 bytes
 *   T                      type parameter in scope
 *   Int, Ref<'a, Int>      user types (lifetime arguments first)
 *   Option<Int>{Some|None} variant refinement
 *   'a: 'b, T: 'a, T: Copy where-clause entries
 */

import type {
  IrLifetime,
  IrType,
  IrWhereClause,
} from "../ir/types/index.js";
import { STATIC_LIFETIME } from "../ir/types/index.js";
import type { Result } from "../types/result.js";
import { ok, error } from "../types/result.js";

export type TypeScope = {
  /** Type parameters visible at this point */
  readonly typeParameters: ReadonlySet<string>;
  /** Declared user types: name → (lifetime arity, type arity) */
  readonly userTypes: ReadonlyMap<
    string,
    { readonly lifetimes: number; readonly types: number }
  >;
};

type Token =
  | { readonly kind: "ident"; readonly text: string }
  | { readonly kind: "lifetime"; readonly text: string }
  | { readonly kind: "number"; readonly value: number }
  | { readonly kind: "punct"; readonly text: string };

const PUNCTUATION = new Set(["<", ">", ",", "{", "}", "|", "!", ":"]);

const tokenize = (source: string): Result<readonly Token[], string> => {
  const tokens: Token[] = [];
  let i = 0;

  while (i < source.length) {
    const ch = source.charAt(i);

    if (/\s/.test(ch)) {
      i++;
      continue;
    }

    if (PUNCTUATION.has(ch)) {
      tokens.push({ kind: "punct", text: ch });
      i++;
      continue;
    }

    const rest = source.slice(i);

    const lifetimeMatch = /^'([A-Za-z_][A-Za-z0-9_]*)/.exec(rest);
    const lifetimeName = lifetimeMatch?.[1];
    if (lifetimeMatch && lifetimeName !== undefined) {
      tokens.push({ kind: "lifetime", text: lifetimeName });
      i += lifetimeMatch[0].length;
      continue;
    }

    const identMatch = /^[A-Za-z_][A-Za-z0-9_]*/.exec(rest);
    if (identMatch) {
      tokens.push({ kind: "ident", text: identMatch[0] });
      i += identMatch[0].length;
      continue;
    }

    const numberMatch = /^[0-9]+/.exec(rest);
    if (numberMatch) {
      tokens.push({ kind: "number", value: Number(numberMatch[0]) });
      i += numberMatch[0].length;
      continue;
    }

    return error(`unexpected character '${ch}' at offset ${i}`);
  }

  return ok(tokens);
};

class TypeParser {
  private position = 0;

  constructor(
    private readonly tokens: readonly Token[],
    private readonly scope: TypeScope
  ) {}

  atEnd(): boolean {
    return this.position >= this.tokens.length;
  }

  private peek(): Token | undefined {
    return this.tokens[this.position];
  }

  private isPunct(text: string): boolean {
    const token = this.peek();
    return token?.kind === "punct" && token.text === text;
  }

  private expectPunct(text: string): Result<void, string> {
    if (!this.isPunct(text)) {
      return error(`expected '${text}'${this.describeNext()}`);
    }
    this.position++;
    return ok(undefined);
  }

  private describeNext(): string {
    const token = this.peek();
    if (token === undefined) return " but reached end of input";
    switch (token.kind) {
      case "ident":
      case "punct":
        return ` but found '${token.text}'`;
      case "lifetime":
        return ` but found '${token.text} lifetime`;
      case "number":
        return ` but found ${token.value}`;
    }
  }

  parseLifetime(): Result<IrLifetime, string> {
    const token = this.peek();
    if (token?.kind !== "lifetime") {
      return error(`expected a lifetime${this.describeNext()}`);
    }
    this.position++;
    return ok(
      token.text === "static"
        ? STATIC_LIFETIME
        : { kind: "namedLifetime", name: token.text }
    );
  }

  parseType(): Result<IrType, string> {
    if (this.isPunct("!")) {
      this.position++;
      return ok({ kind: "absurdType" });
    }

    const token = this.peek();
    if (token?.kind !== "ident") {
      return error(`expected a type${this.describeNext()}`);
    }
    this.position++;

    if (token.text === "Uninit") {
      return this.parseUninit();
    }

    if (this.scope.typeParameters.has(token.text)) {
      return ok({ kind: "typeParameterType", name: token.text });
    }

    const declared = this.scope.userTypes.get(token.text);
    if (declared === undefined) {
      return error(`unknown type '${token.text}'`);
    }

    const typeArguments: IrType[] = [];
    const lifetimeArguments: IrLifetime[] = [];

    if (this.isPunct("<")) {
      this.position++;
      while (true) {
        if (this.peek()?.kind === "lifetime") {
          if (typeArguments.length > 0) {
            return error(
              `lifetime arguments of '${token.text}' must precede its type arguments`
            );
          }
          const lifetime = this.parseLifetime();
          if (!lifetime.ok) return lifetime;
          lifetimeArguments.push(lifetime.value);
        } else {
          const arg = this.parseType();
          if (!arg.ok) return arg;
          typeArguments.push(arg.value);
        }
        if (this.isPunct(",")) {
          this.position++;
          continue;
        }
        const close = this.expectPunct(">");
        if (!close.ok) return close;
        break;
      }
    }

    if (
      lifetimeArguments.length !== declared.lifetimes ||
      typeArguments.length !== declared.types
    ) {
      return error(
        `'${token.text}' takes ${declared.lifetimes} lifetime and ${declared.types} type arguments, got ${lifetimeArguments.length} and ${typeArguments.length}`
      );
    }

    if (!this.isPunct("{")) {
      return ok({
        kind: "userType",
        name: token.text,
        typeArguments,
        lifetimeArguments,
      });
    }

    this.position++;
    const variants: string[] = [];
    while (true) {
      const variant = this.peek();
      if (variant?.kind !== "ident") {
        return error(`expected a variant name${this.describeNext()}`);
      }
      this.position++;
      variants.push(variant.text);
      if (this.isPunct("|")) {
        this.position++;
        continue;
      }
      const close = this.expectPunct("}");
      if (!close.ok) return close;
      break;
    }

    return ok({
      kind: "userType",
      name: token.text,
      typeArguments,
      lifetimeArguments,
      variants,
    });
  }

  private parseUninit(): Result<IrType, string> {
    const open = this.expectPunct("<");
    if (!open.ok) return open;
    const size = this.peek();
    if (size?.kind !== "number") {
      return error(`expected a byte size${this.describeNext()}`);
    }
    this.position++;
    const close = this.expectPunct(">");
    if (!close.ok) return close;
    return ok({ kind: "uninitType", size: size.value });
  }

  /**
   * `'a: 'b`, `T: 'a` or `T: Trait`
   */
  parseWhereClause(): Result<IrWhereClause, string> {
    if (this.peek()?.kind === "lifetime") {
      const longer = this.parseLifetime();
      if (!longer.ok) return longer;
      const colon = this.expectPunct(":");
      if (!colon.ok) return colon;
      const shorter = this.parseLifetime();
      if (!shorter.ok) return shorter;
      return ok({
        kind: "lifetimeOutlives",
        longer: longer.value,
        shorter: shorter.value,
      });
    }

    const type = this.parseType();
    if (!type.ok) return type;
    const colon = this.expectPunct(":");
    if (!colon.ok) return colon;

    const bound = this.peek();
    if (bound?.kind === "lifetime") {
      const shorter = this.parseLifetime();
      if (!shorter.ok) return shorter;
      return ok({ kind: "typeOutlives", type: type.value, shorter: shorter.value });
    }
    if (bound?.kind === "ident") {
      this.position++;
      return ok({ kind: "traitBound", trait: bound.text, type: type.value });
    }
    return error(`expected a lifetime or trait name${this.describeNext()}`);
  }

  trailing(): Result<void, string> {
    return this.atEnd()
      ? ok(undefined)
      : error(`unexpected input${this.describeNext()}`);
  }
}

const runParser = <T>(
  source: string,
  scope: TypeScope,
  parse: (parser: TypeParser) => Result<T, string>
): Result<T, string> => {
  const tokens = tokenize(source);
  if (!tokens.ok) return tokens;
  const parser = new TypeParser(tokens.value, scope);
  const result = parse(parser);
  if (!result.ok) return result;
  const end = parser.trailing();
  return end.ok ? result : end;
};

export const parseType = (
  source: string,
  scope: TypeScope
): Result<IrType, string> => runParser(source, scope, (p) => p.parseType());

export const parseLifetime = (source: string): Result<IrLifetime, string> =>
  runParser(
    source,
    { typeParameters: new Set(), userTypes: new Map() },
    (p) => p.parseLifetime()
  );

export const parseWhereClause = (
  source: string,
  scope: TypeScope
): Result<IrWhereClause, string> =>
  runParser(source, scope, (p) => p.parseWhereClause());
