import { expect } from "chai";

import { ParseError } from "../errors.js";
import { withBinding, withInitializer } from "./derived-type.js";

describe("@gridweave/compiler derived-type text", () => {
  it("replaces an initial value across a continuation", () => {
    expect(withInitializer("integer :: iterates_over = &\n  & go_all_pts", "iterates_over", "go_internal_pts")).to.equal(
      "integer :: iterates_over = &\n  & go_internal_pts"
    );
  });

  it("replaces a binding written without an arrow", () => {
    expect(withBinding("procedure, nopass :: compute_code", "new_code")).to.equal("procedure, nopass :: new_code");
  });

  it("fails instead of keeping the old text when nothing matches", () => {
    expect(() => withInitializer("integer :: index_offset = go_offset_sw", "iterates_over", "go_all_pts")).to.throw(
      ParseError,
      "Could not find the value of 'iterates_over' in the derived-type text to replace it with 'go_all_pts'."
    );
    expect(() => withBinding("contains\nend type t", "new_code")).to.throw(
      ParseError,
      "Could not find the type-bound procedure in the derived-type text to replace it with 'new_code'."
    );
  });
});
