import { entityCount, lookupEntity } from "../../src/html/entities.js";

describe("lookupEntity", () => {
  it("maps entity names to code points", () => {
    expect(lookupEntity("amp")).toBe(38);
    expect(lookupEntity("nbsp")).toBe(160);
    expect(lookupEntity("le")).toBe(8804);
    expect(lookupEntity("Omega")).toBe(937);
  });

  it("is case-sensitive", () => {
    expect(lookupEntity("omega")).toBe(969);
    expect(lookupEntity("AMP")).toBeUndefined();
  });

  it("only knows the HTML 4 names", () => {
    expect(entityCount()).toBe(252);
    expect(lookupEntity("apos")).toBeUndefined();
  });
});
