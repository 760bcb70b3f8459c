import * as _ from 'lodash-es';
import { COMPOSITE_PLACEHOLDERS } from './constants';

export interface ReplaceOptions {
    /** Tokens to substitute first, in this order; unlisted tokens follow in default order */
    order?: readonly string[];
}

interface Segment {
    text: string;
    /** Substituted text is never scanned again */
    frozen: boolean;
}

/**
 * Substitution order: explicit order first, then longer tokens before shorter ones,
 * composite placeholders last.
 */
function placeholderOrder(tokens: readonly string[], explicit: readonly string[] = []): string[] {
    const listed = _.filter(_.uniq(explicit), (token) => tokens.includes(token));
    const rest = _.difference(tokens, listed);
    const [composite, plain] = _.partition(rest, (token) => COMPOSITE_PLACEHOLDERS.includes(token));
    return [...listed, ..._.sortBy(plain, (token) => -token.length), ...composite];
}

function substitute(segments: Segment[], token: string, value: string): Segment[] {
    return _.flatMap(segments, (segment) => {
        if (segment.frozen || !segment.text.includes(token)) return [segment];

        const parts = segment.text.split(token);
        return _.flatMap(parts, (part, i): Segment[] => {
            const pieces: Segment[] = [];
            if (i > 0) pieces.push({ text: value, frozen: true });
            if (part) pieces.push({ text: part, frozen: false });
            return pieces;
        });
    });
}

/**
 * Replace placeholder tokens in one pass per token.
 * A replacement value is inserted literally, even when it contains another token.
 */
function replaceText(text: string, values: Readonly<Record<string, string>>, options: ReplaceOptions = {}): string {
    const tokens = _.filter(_.keys(values), (token) => token !== '');
    if (!text || tokens.length === 0) return text;

    let segments: Segment[] = [{ text, frozen: false }];
    for (const token of placeholderOrder(tokens, options.order)) {
        segments = substitute(segments, token, values[token]);
    }
    return _.map(segments, 'text').join('');
}

export { placeholderOrder, replaceText };
