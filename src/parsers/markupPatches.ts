// Known breakage in problem statement markup, fixed up before tokenizing.
const MARKUP_PATCHES: ReadonlyArray<readonly [string, string]> = [
  ["<p</p>", "<p></p>"],
  ["<ul</ul>", "<ul></ul>"],
  ['<div class="sample-test"<', '<div class="sample-test"><'],
];

export function patchProblemMarkup(html: string): string {
  return MARKUP_PATCHES.reduce((patched, [broken, fixed]) => patched.replaceAll(broken, fixed), html);
}
