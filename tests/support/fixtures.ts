import type { ScanResultInput } from "../../src/core/scan/scan.types";

export const scanIdA = "01890a5d-ac96-774b-bcce-b302099a8057";
export const scanIdB = "01890a5d-ac96-774b-bcce-b302099a8058";
export const unknownScanId = "01890a5d-ac96-774b-bcce-b302099a80ff";

export const makeResult = (testId: string, overrides: Partial<ScanResultInput> = {}): ScanResultInput => ({
  testId,
  testName: `Check ${testId}`,
  category: "headers",
  severity: "high",
  passed: false,
  message: "",
  reference: "",
  remediation: "",
  ...overrides
});

export const silenceConsole = () => {
  const spies = [
    jest.spyOn(console, "log").mockImplementation(() => undefined),
    jest.spyOn(console, "warn").mockImplementation(() => undefined),
    jest.spyOn(console, "error").mockImplementation(() => undefined)
  ];
  return () => spies.forEach((spy) => spy.mockRestore());
};
