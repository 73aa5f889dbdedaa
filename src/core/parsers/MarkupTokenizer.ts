export type MarkupToken =
    | { type: "text"; value: string }
    | { type: "tag"; raw: string; name: string; closing: boolean; attributes: Record<string, string> };

type State = "text" | "tag";

const CLOSERS: Record<string, string> = { "<": ">", "{": "}" };
const ATTRIBUTE_REGEX = /([a-zA-Z_:][-a-zA-Z0-9_:.]*)\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s"'>]+))/g;

/**
 * Splits cue text into plain text runs and bracketed markup.
 *
 * Two states: outside a tag, and inside one. `<...>` (HTML-style, as SRT
 * font tags) and `{...}` (ASS override blocks) both count as tags. A bracket
 * that is never closed is kept as literal text.
 */
export function tokenizeMarkup(input: string): MarkupToken[] {
    const tokens: MarkupToken[] = [];
    let state: State = "text";
    let buffer = "";
    let opener = "";

    const flushText = () => {
        if (buffer) tokens.push({ type: "text", value: buffer });
        buffer = "";
    };

    for (const char of input) {
        if (state === "text") {
            if (char in CLOSERS) {
                flushText();
                state = "tag";
                opener = char;
                buffer = char;
            } else {
                buffer += char;
            }
            continue;
        }

        buffer += char;
        if (char === CLOSERS[opener]) {
            tokens.push(parseTag(buffer));
            buffer = "";
            state = "text";
        }
    }

    // Unterminated tag: treat what was collected as text
    if (buffer) {
        const last = tokens[tokens.length - 1];
        if (last && last.type === "text") {
            last.value += buffer;
        } else {
            tokens.push({ type: "text", value: buffer });
        }
    }

    return tokens;
}

function parseTag(raw: string): MarkupToken {
    if (raw.startsWith("{")) {
        return { type: "tag", raw, name: "", closing: false, attributes: {} };
    }

    const body = raw.slice(1, -1).trim();
    const closing = body.startsWith("/");
    const nameMatch = /^\/?\s*([a-zA-Z][a-zA-Z0-9]*)/.exec(body);
    const name = nameMatch ? nameMatch[1].toLowerCase() : "";

    const attributes: Record<string, string> = {};
    for (const match of body.matchAll(ATTRIBUTE_REGEX)) {
        attributes[match[1].toLowerCase()] = match[2] ?? match[3] ?? match[4] ?? "";
    }

    return { type: "tag", raw, name, closing, attributes };
}

/**
 * Removes every tag and returns the remaining text along with the first
 * `<font color="...">` value found.
 */
export function stripMarkup(input: string): { text: string; color?: string } {
    let text = "";
    let color: string | undefined;

    for (const token of tokenizeMarkup(input)) {
        if (token.type === "text") {
            text += token.value;
        } else if (color === undefined && token.name === "font" && !token.closing && token.attributes.color) {
            color = token.attributes.color;
        }
    }

    return color === undefined ? { text } : { text, color };
}
