import { MalformedInputError, MarkupDocument, type MarkupKind, vec3Schema } from '@mrkjson/markup-core';
import { z } from 'zod';
import { writeFileReported } from '../util/FileUtil';

// Raw user data; shape and numbers are checked at run time
export type PointArrangement = readonly (readonly number[])[];
export type PolylineArrangement = readonly PointArrangement[];

export const pointArrangementSchema = z.array(vec3Schema);
export const lineArrangementSchema = z.array(z.tuple([vec3Schema, vec3Schema]));
export const curveArrangementSchema = z.array(z.array(vec3Schema));

/**
 * Check raw arrangements before anything is built from them.
 * Returns undefined for an empty arrangement, which builds nothing.
 */
export function parseArrangements<T extends z.ZodTypeAny>(schema: T, input: unknown, what: string): z.output<T> | undefined {
    if (!Array.isArray(input)) {
        throw new MalformedInputError(`Expected a list of ${what}s`);
    }
    if (input.length === 0) return undefined;
    const result = schema.safeParse(input);
    if (!result.success) {
        const issue = result.error.issues[0];
        throw new MalformedInputError(`Malformed ${what} at [${issue?.path.join('][') ?? ''}]: ${issue?.message ?? 'invalid'}`);
    }
    return result.data;
}

export function documentText(document: MarkupDocument | null): string {
    return document ? document.encode() : '';
}

export function printText(text: string, out: NodeJS.WritableStream) {
    out.write(`${text}\n`);
}

export function writeText(text: string, filePath: string): Promise<boolean> {
    return writeFileReported(filePath, `${text}\n`);
}

/**
 * Geometry that can be shown as a markups document.
 *
 * Subclasses say how their geometry becomes markups in `rebuildMarkups`.  The
 *   document is derived and rebuilt before every print or write; the geometry is
 *   the source of truth.
 */
export abstract class MarkupRepresentable {
    abstract readonly kind: MarkupKind;
    readonly document: MarkupDocument = new MarkupDocument();

    /** Replace the document's markups with ones built from the current geometry */
    abstract rebuildMarkups(): void;

    toJSONString(): string {
        this.rebuildMarkups();
        return this.document.encode();
    }

    print(out: NodeJS.WritableStream = process.stdout) {
        printText(this.toJSONString(), out);
    }

    /**
     * Save as a .mrk.json file.  A failed write is logged, not thrown;
     *   the result says whether it went through.
     */
    write(filePath: string): Promise<boolean> {
        return writeText(this.toJSONString(), filePath);
    }
}
