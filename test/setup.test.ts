import * as fs from "fs";
import * as path from "path";

describe("Project setup", () => {
  const rootDir = path.resolve(__dirname, "..");

  it("should have required directory structure", () => {
    expect(fs.existsSync(path.join(rootDir, "srv"))).toBe(true);
    expect(fs.existsSync(path.join(rootDir, "srv", "adapters"))).toBe(true);
    expect(fs.existsSync(path.join(rootDir, "srv", "adapters", "interfaces"))).toBe(true);
    expect(fs.existsSync(path.join(rootDir, "srv", "lib"))).toBe(true);
    expect(fs.existsSync(path.join(rootDir, "test"))).toBe(true);
  });

  it("should declare the Azure storage SDK as a runtime dependency", () => {
    const pkg = JSON.parse(fs.readFileSync(path.join(rootDir, "package.json"), "utf-8"));
    expect(pkg.dependencies["@azure/storage-blob"]).toBeDefined();
    expect(pkg.dependencies["@sap/cds"]).toBeDefined();
  });

  it("should have TypeScript strict mode enabled", () => {
    const tsconfig = JSON.parse(fs.readFileSync(path.join(rootDir, "tsconfig.json"), "utf-8"));
    expect(tsconfig.compilerOptions.strict).toBe(true);
  });
});
