export interface StartTagToken {
  readonly type: "StartTag";
  readonly name: string;
  readonly attributes: Readonly<Record<string, string>>;
  readonly selfClosing: boolean;
}

export interface EndTagToken {
  readonly type: "EndTag";
  readonly name: string;
}

export interface TextToken {
  readonly type: "Text";
  readonly data: string;
}

/** `&name;`, with `data` holding the character it stands for. */
export interface EntityRefToken {
  readonly type: "EntityRef";
  readonly name: string;
  readonly data: string;
}

/** `&#65;` or `&#x41;`, with `data` holding the character it stands for. */
export interface CharRefToken {
  readonly type: "CharRef";
  readonly codePoint: number;
  readonly isHex: boolean;
  readonly data: string;
}

export type HtmlToken = StartTagToken | EndTagToken | TextToken | EntityRefToken | CharRefToken;

export type CharacterDataToken = TextToken | EntityRefToken | CharRefToken;
