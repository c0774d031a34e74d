import { parseArgs } from "../src/config";
import { ConfigurationError } from "../src/errors";

describe("parseArgs", () => {
  it("defaults to an interactive session without display digits", () => {
    expect(parseArgs([])).toEqual({ displayDigits: 0, verbose: false });
  });

  it("reads the script path and options", () => {
    expect(parseArgs(["loan.keys", "--digits", "3", "-v"])).toEqual({
      scriptPath: "loan.keys",
      displayDigits: 3,
      verbose: true,
    });
  });

  it.each([
    [["--digits"]],
    [["--digits", "x"]],
    [["-d", "22"]],
    [["--bogus"]],
    [["one.keys", "two.keys"]],
  ])("rejects %j", (args) => {
    expect(() => parseArgs(args)).toThrow(ConfigurationError);
  });
});
