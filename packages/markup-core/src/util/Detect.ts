import type { MarkupKind } from '../types/MarkupTypes';
import { UnrecognizedFormatError } from './Errors';
import { acceptsType, MARKUP_KIND_ORDER } from './Markup';
import { MarkupDocument, parseMarkupsJson } from './MarkupDocument';
import type { MarkupsFile } from './MarkupSchema';

export interface DecodedMarkupFile {
    kind: MarkupKind;
    document: MarkupDocument;
}

export function containsKind(file: MarkupsFile, kind: MarkupKind): boolean {
    return file.markups.some((m) => acceptsType(kind, m.type));
}

/**
 * Which kind of markups a file holds.  Kinds are tried point, line, then curve;
 *   files are expected to hold one kind only, so the first kind present wins.
 */
export function detectMarkupKind(content: string | MarkupsFile): MarkupKind {
    const file = typeof content === 'string' ? parseMarkupsJson(content) : content;
    const kind = MARKUP_KIND_ORDER.find((k) => containsKind(file, k));
    if (!kind) {
        const found = file.markups.map((m) => m.type);
        throw new UnrecognizedFormatError(
            found.length ? `No supported markup type among: ${found.join(', ')}` : 'Document contains no markups',
        );
    }
    return kind;
}

export function decodeMarkupFile(text: string): DecodedMarkupFile {
    const file = parseMarkupsJson(text);
    const kind = detectMarkupKind(file);
    return { kind, document: MarkupDocument.decode(file, kind) };
}
