import { ParseError } from "../errors.js";
import { DerivedTypeDefinition, constructorItems, withBinding, withInitializer } from "./derived-type.js";
import { LFRIC_VOCABULARY, lfricArgFromFortranString, quotedList } from "./lfric-args.js";
import type { AnyLfricArg } from "./lfric-args.js";

function checkOperatesOn(value: string): string {
  if (!LFRIC_VOCABULARY.operatesOn.includes(value.toLowerCase())) {
    throw new ParseError(
      "GW3003",
      `The 'operates_on' metadata should be a recognised value (one of ${quotedList(LFRIC_VOCABULARY.operatesOn)}), but found '${value}'.`
    );
  }
  return value;
}

/** LFRic kernel metadata: `meta_args`, `operates_on` and the bound code. */
export class LfricKernelMetadata {
  readonly name: string;
  readonly metaArgs: readonly AnyLfricArg[];
  readonly #source: string;
  #operatesOn: string;
  #code: string;
  #text: string | null;

  private constructor(source: string, name: string, metaArgs: readonly AnyLfricArg[], operatesOn: string, code: string) {
    this.#source = source;
    this.#text = source;
    this.name = name;
    this.metaArgs = Object.freeze([...metaArgs]);
    this.#operatesOn = operatesOn;
    this.#code = code;
  }

  static fromDeclaration(text: string): LfricKernelMetadata {
    const def = DerivedTypeDefinition.parse(text);
    let metaArgs: string | null = null;
    let operatesOn: string | null = null;
    for (const c of def.components) {
      const name = c.name.toLowerCase();
      if (name !== "meta_args" && name !== "operates_on") {
        throw new ParseError(
          "GW3008",
          `Expecting metadata entries to be one of 'meta_args' or 'operates_on', but found '${c.name}' in '${def.name}'.`
        );
      }
      const already = name === "meta_args" ? metaArgs : operatesOn;
      if (already !== null) {
        throw new ParseError("GW3006", `'${name}' should only be defined once in the metadata, but found it again in '${def.name}'.`);
      }
      if (c.initializer === null) throw new ParseError("GW3012", `'${name}' has no value in '${def.name}'.`);
      if (name === "meta_args") metaArgs = c.initializer;
      else operatesOn = c.initializer;
    }
    if (metaArgs === null || operatesOn === null) {
      const missing = metaArgs === null ? "meta_args" : "operates_on";
      throw new ParseError(
        "GW3007",
        `Expecting '${missing}' to be an entry in the metadata but it was not found in '${def.name}'.`
      );
    }
    if (def.bindings === null) {
      throw new ParseError(
        "GW3009",
        `The metadata '${def.name}' does not have a contains keyword, which is required to name the kernel code.`
      );
    }
    const [binding, ...others] = def.bindings;
    if (binding === undefined || others.length > 0) {
      throw new ParseError("GW3010", `Expecting a single entry after the 'contains' keyword but found ${def.bindings.length}.`);
    }
    const args = constructorItems(metaArgs).map((a) => lfricArgFromFortranString(a));
    return new LfricKernelMetadata(text, def.name, args, checkOperatesOn(operatesOn), binding.procedure);
  }

  get operatesOn(): string {
    return this.#operatesOn;
  }

  set operatesOn(value: string) {
    this.#operatesOn = checkOperatesOn(value);
    this.#text = null;
  }

  get code(): string {
    return this.#code;
  }

  set code(value: string) {
    if (!/^[A-Za-z]\w*$/.test(value)) {
      throw new ParseError("GW3012", `The kernel code must be a Fortran name, but found '${value}'.`);
    }
    this.#code = value;
    this.#text = null;
  }

  fortranString(): string {
    if (this.#text === null) {
      this.#text = withBinding(withInitializer(this.#source, "operates_on", this.#operatesOn), this.#code);
    }
    return this.#text;
  }
}
