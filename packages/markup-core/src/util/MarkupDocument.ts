import type { MarkupDocumentJSON, MarkupKind, Vec3 } from '../types/MarkupTypes';
import { UnrecognizedFormatError, UnrecognizedMarkupTypeError } from './Errors';
import { acceptsType, Markup, MARKUP_VARIANTS } from './Markup';
import { type MarkupsFile, markupsFileSchema } from './MarkupSchema';
import { JSON_INDENT, MARKUPS_SCHEMA_URL } from './Settings';

/**
 * Parse markups file text and check its shape.
 * Anything that is not JSON with a `markups` array is an unrecognized format.
 */
export function parseMarkupsJson(text: string): MarkupsFile {
    let json: unknown;
    try {
        json = JSON.parse(text);
    } catch (error) {
        throw new UnrecognizedFormatError(`Content is not JSON: ${error}`);
    }
    return validateMarkupsJson(json);
}

export function validateMarkupsJson(json: unknown): MarkupsFile {
    const result = markupsFileSchema.safeParse(json);
    if (!result.success) {
        const issue = result.error.issues[0];
        const where = issue?.path.length ? ` at ${issue.path.join('.')}` : '';
        throw new UnrecognizedFormatError(`Content is not a markups document${where}: ${issue?.message ?? 'invalid'}`);
    }
    return result.data;
}

/**
 * An ordered list of markups; the unit that is written to and read from a .mrk.json file
 */
export class MarkupDocument {
    markups: Markup[];

    constructor(markups: Markup[] = []) {
        this.markups = markups;
    }

    replaceMarkups(markups: Markup[]) {
        this.markups = markups;
    }

    /** Every control point position; markups outer, control points inner */
    points(): Vec3[] {
        return this.markups.flatMap((m) => m.positions());
    }

    toJSON(): MarkupDocumentJSON {
        return {
            '@schema': MARKUPS_SCHEMA_URL,
            markups: this.markups.map((m) => m.toJSON()),
        };
    }

    encode(): string {
        return JSON.stringify(this, null, JSON_INDENT);
    }

    /**
     * Rebuild typed markups of one kind from a parsed document.
     * Each control point is re-added, keeping its original id as label suffix.
     */
    static decode(json: unknown, kind: MarkupKind): MarkupDocument {
        const file = validateMarkupsJson(json);
        const variant = MARKUP_VARIANTS[kind];
        const markups: Markup[] = [];
        for (const item of file.markups) {
            const type = item.type;
            if (!acceptsType(kind, type)) {
                throw new UnrecognizedMarkupTypeError(type, variant.types);
            }
            const markup = new Markup(type);
            for (const cp of item.controlPoints) {
                markup.add(cp.position, cp.id);
            }
            markups.push(markup);
        }
        return new MarkupDocument(markups);
    }

    static parse(text: string, kind: MarkupKind): MarkupDocument {
        return MarkupDocument.decode(parseMarkupsJson(text), kind);
    }
}
