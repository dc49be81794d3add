import { expect } from "chai";

import { ParseError } from "../errors.js";
import { argIndexToMetadataIndex } from "./arg-index.js";
import {
  ColumnwiseOperatorArg,
  FieldArg,
  FieldVectorArg,
  OperatorArg,
  ScalarArg,
  lfricArgFromFortranString,
} from "./lfric-args.js";
import { LfricKernelMetadata } from "./lfric-kernel.js";

const SPACES =
  "['w3', 'wtheta', 'w2v', 'w2vtrace', 'w2broken', 'w0', 'w1', 'w2', 'w2trace', 'w2h', 'w2htrace', 'any_w2', 'wchi']";

const KERNEL = [
  "type, extends(kernel_type) :: testkern_type",
  "  type(arg_type), dimension(4) :: meta_args = (/ &",
  "    arg_type(GH_FIELD, GH_REAL, GH_INC, W0), &",
  "    arg_type(GH_SCALAR, GH_REAL, GH_READ), &",
  "    arg_type(GH_FIELD*3, GH_REAL, GH_READ, W0), &",
  "    arg_type(GH_OPERATOR, GH_REAL, GH_READ, W0, W1) /)",
  "  integer :: operates_on = CELL_COLUMN",
  "contains",
  "  procedure, nopass :: testkern_code",
  "end type testkern_type",
].join("\n");

describe("@gridweave/compiler lfric argument metadata", () => {
  it("creates an operator argument with no values", () => {
    const op = new OperatorArg();
    expect(op.form).to.equal("GH_OPERATOR");
    expect(op.datatype).to.equal(undefined);
    expect(op.functionSpace2).to.equal(undefined);
  });

  it("names the entry position and the allowed set for invalid values", () => {
    expect(() => new OperatorArg("invalid")).to.throw(
      ParseError,
      "The second metadata entry for an argument should be a recognised datatype descriptor (one of ['gh_real']), but found 'invalid'."
    );
    expect(() => new OperatorArg(undefined, "invalid")).to.throw(
      ParseError,
      "The third metadata entry for an argument should be a recognised access descriptor (one of ['gh_read', 'gh_write', 'gh_readwrite']), but found 'invalid'."
    );
    expect(() => new OperatorArg(undefined, undefined, "invalid")).to.throw(
      ParseError,
      `The fourth metadata entry for an argument should be a recognised function space (one of ${SPACES}), but found 'invalid'.`
    );
    expect(() => new OperatorArg(undefined, undefined, undefined, "invalid")).to.throw(
      ParseError,
      `The fifth metadata entry for an argument should be a recognised function space (one of ${SPACES}), but found 'invalid'.`
    );
  });

  it("round-trips arg_type text", () => {
    for (const text of [
      "arg_type(GH_OPERATOR, GH_REAL, GH_READ, W0, W1)",
      "arg_type(GH_COLUMNWISE_OPERATOR, GH_REAL, GH_WRITE, W3, W2)",
      "arg_type(GH_SCALAR, GH_REAL, GH_READ)",
      "arg_type(GH_FIELD, GH_INTEGER, GH_WRITE, ANY_SPACE_1)",
      "arg_type(GH_FIELD*3, GH_REAL, GH_INC, W0)",
    ]) {
      expect(lfricArgFromFortranString(text).fortranString()).to.equal(text);
    }
    expect(lfricArgFromFortranString("arg_type(GH_COLUMNWISE_OPERATOR, GH_REAL, GH_READ, W0, W1)")).to.be.instanceOf(
      ColumnwiseOperatorArg
    );
  });

  it("rejects text that is not an arg_type entry", () => {
    expect(() => OperatorArg.fromFortranString("not valid")).to.throw(
      ParseError,
      "Expected kernel metadata in the form 'arg_type(...)' but found 'not valid'."
    );
    expect(() => OperatorArg.fromFortranString("hello(x)")).to.throw(
      ParseError,
      "Expected kernel metadata to have the name 'arg_type' and be in the form 'arg_type(...)', but found 'hello(x)'."
    );
    expect(() => OperatorArg.fromFortranString("arg_type(x)")).to.throw(
      ParseError,
      "Expected kernel metadata to have 5 arguments, but found 1 in 'arg_type(x)'."
    );
    expect(() => lfricArgFromFortranString("arg_type(GH_UNKNOWN, GH_REAL)")).to.throw(
      ParseError,
      "The first metadata entry for an argument should be one of ['gh_scalar', 'gh_field', 'gh_field*n', 'gh_operator', 'gh_columnwise_operator'], but found 'GH_UNKNOWN'."
    );
  });

  it("requires every value before writing", () => {
    expect(() => new OperatorArg().fortranString()).to.throw(
      ParseError,
      "Values for datatype, access, function_space1 and function_space2 must be provided before calling the fortranString method, but found 'undefined', 'undefined', 'undefined' and 'undefined', respectively."
    );
    expect(() => new ScalarArg("GH_REAL").fortranString()).to.throw(
      ParseError,
      "Values for datatype and access must be provided before calling the fortranString method, but found 'GH_REAL' and 'undefined', respectively."
    );
  });

  it("validates values given to setters and keeps their spelling", () => {
    const field = new FieldArg();
    field.datatype = "GH_REAL";
    field.access = "gh_inc";
    field.functionSpace = "W2";
    expect(field.fortranString()).to.equal("arg_type(GH_FIELD, GH_REAL, gh_inc, W2)");
    const scalar = new ScalarArg();
    expect(() => {
      scalar.access = "gh_inc";
    }).to.throw(
      ParseError,
      "The third metadata entry for an argument should be a recognised access descriptor (one of ['gh_read', 'gh_sum']), but found 'gh_inc'."
    );
  });

  it("checks the length of a field vector", () => {
    expect(FieldVectorArg.fromFortranString("arg_type(GH_FIELD*3, GH_REAL, GH_INC, W0)").vectorLength).to.equal("3");
    expect(() => FieldVectorArg.fromFortranString("arg_type(GH_FIELD*1, GH_REAL, GH_INC, W0)")).to.throw(
      ParseError,
      "The vector length metadata should be a string containing an integer greater than 1, but found '1'."
    );
  });
});

describe("@gridweave/compiler lfric kernel metadata", () => {
  it("parses meta_args and operates_on", () => {
    const md = LfricKernelMetadata.fromDeclaration(KERNEL);
    expect(md.name).to.equal("testkern_type");
    const [field, scalar, vector, operator] = md.metaArgs;
    expect(field).to.be.instanceOf(FieldArg);
    expect(scalar).to.be.instanceOf(ScalarArg);
    expect(vector).to.be.instanceOf(FieldVectorArg);
    expect(operator).to.be.instanceOf(OperatorArg);
    expect(md.operatesOn).to.equal("CELL_COLUMN");
    expect(md.code).to.equal("testkern_code");
    expect(md.fortranString()).to.equal(KERNEL);
  });

  it("rewrites only the changed values", () => {
    const md = LfricKernelMetadata.fromDeclaration(KERNEL);
    md.operatesOn = "domain";
    md.code = "other_code";
    expect(md.fortranString()).to.equal(
      KERNEL.replace("CELL_COLUMN", "domain").replace(":: testkern_code", ":: other_code")
    );
    expect(() => {
      md.operatesOn = "edge";
    }).to.throw(
      ParseError,
      "The 'operates_on' metadata should be a recognised value (one of ['cell_column', 'domain']), but found 'edge'."
    );
  });

  it("requires operates_on", () => {
    expect(() => LfricKernelMetadata.fromDeclaration(KERNEL.replace("  integer :: operates_on = CELL_COLUMN\n", ""))).to.throw(
      ParseError,
      "Expecting 'operates_on' to be an entry in the metadata but it was not found in 'testkern_type'."
    );
  });

  it("maps kernel argument positions to meta_args indices", () => {
    const map = argIndexToMetadataIndex(LfricKernelMetadata.fromDeclaration(KERNEL));
    expect([...map.entries()]).to.deep.equal([
      [1, 0],
      [2, 1],
      [3, 2],
      [4, 2],
      [5, 2],
      [7, 3],
    ]);
  });
});
