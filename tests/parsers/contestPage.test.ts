import { tokenize } from "../../src/html/tokenizer.js";
import { collectProblemIds, parseContestPage } from "../../src/parsers/contestPage.js";

describe("parseContestPage", () => {
  it("collects distinct problem ids in ascending order", () => {
    const html = `
      <table class="problems">
        <tr><td><a href="/contest/1000/problem/B">B</a></td></tr>
        <tr><td><a href="/contest/1000/problem/A">A</a></td></tr>
        <tr><td><a href="https://codeforces.com/contest/1000/problem/B">B again</a></td></tr>
        <tr><td><a href="/contest/1000/problem/C1">C1</a></td></tr>
      </table>`;
    expect(parseContestPage(html)).toEqual(["A", "B", "C1"]);
  });

  it("ignores links that do not point at a problem", () => {
    const html = `
      <a href="/contest/1000/standings">Standings</a>
      <a>No target</a>
      <a href="">Empty</a>
      <link rel="alternate" href="/contest/1000/problem/Z">
      <div href="/contest/1000/problem/Y"></div>`;
    expect(parseContestPage(html)).toEqual([]);
  });

  it("matches the pattern anywhere in the link target", () => {
    const html = '<a href="/gym/contest/5/problem/D?locale=en">D</a>';
    expect(parseContestPage(html)).toEqual(["D"]);
  });

  it("returns an empty list for a page without links", () => {
    expect(parseContestPage("<p>Contest is over.</p>")).toEqual([]);
  });
});

describe("collectProblemIds", () => {
  it("consumes a token stream", () => {
    const ids = collectProblemIds(
      tokenize('<a href="/contest/7/problem/E2"></a><a href="/contest/7/problem/E1"></a>')
    );
    expect(ids).toEqual(["E1", "E2"]);
  });

  it("accepts tokens from any iterable", () => {
    const ids = collectProblemIds([
      { type: "StartTag", name: "a", attributes: { href: "contest/1/problem/F" }, selfClosing: false },
      { type: "StartTag", name: "a", attributes: { href: "contest/1/problem/F" }, selfClosing: false },
      { type: "EndTag", name: "a" },
    ]);
    expect(ids).toEqual(["F"]);
  });
});
