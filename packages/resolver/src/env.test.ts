import { describe, it } from "mocha";
import { expect } from "chai";
import { expandEnvironmentVariables } from "./env.js";

describe("expandEnvironmentVariables", () => {
  const env = { SDK_ROOT: "/opt/sdk", LIBS: "libs" };

  it("should expand %VAR%, ${VAR} and $VAR", () => {
    expect(expandEnvironmentVariables("%SDK_ROOT%/ref", env)).to.equal(
      "/opt/sdk/ref"
    );
    expect(expandEnvironmentVariables("${SDK_ROOT}/${LIBS}", env)).to.equal(
      "/opt/sdk/libs"
    );
    expect(expandEnvironmentVariables("$SDK_ROOT/x", env)).to.equal(
      "/opt/sdk/x"
    );
  });

  it("should leave unknown variables as written", () => {
    expect(expandEnvironmentVariables("%MISSING%/$ALSO_MISSING", env)).to.equal(
      "%MISSING%/$ALSO_MISSING"
    );
  });

  it("should leave plain paths unchanged", () => {
    expect(expandEnvironmentVariables("/usr/lib/modules", env)).to.equal(
      "/usr/lib/modules"
    );
  });
});
