/**
 * Tests for diagnostics
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import { createDiagnostic, formatDiagnostic, isError } from "./diagnostic.js";

describe("Diagnostic", () => {
  it("should format a warning without file or hint", () => {
    const diagnostic = createDiagnostic(
      "GEN2001",
      "warning",
      "Found 'Foo' with version '1.0.0.0' instead of '1.2.0.0'."
    );
    expect(formatDiagnostic(diagnostic)).to.equal(
      "warning GEN2001: Found 'Foo' with version '1.0.0.0' instead of '1.2.0.0'."
    );
    expect(isError(diagnostic)).to.be.false;
  });

  it("should format an error with file and hint", () => {
    const diagnostic = createDiagnostic(
      "GEN1003",
      "error",
      "Invalid JSON",
      "/lib/Foo.metadata.json",
      "Regenerate the file"
    );
    expect(formatDiagnostic(diagnostic)).to.equal(
      "/lib/Foo.metadata.json: error GEN1003: Invalid JSON Hint: Regenerate the file"
    );
    expect(isError(diagnostic)).to.be.true;
  });
});
