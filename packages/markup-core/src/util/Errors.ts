/** Base class of everything the markup codec throws */
export class MarkupError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

/** The content is not a markup document of any supported kind */
export class UnrecognizedFormatError extends MarkupError {}

export class UnrecognizedMarkupTypeError extends MarkupError {
    markupType: string;

    constructor(markupType: string, accepted: readonly string[]) {
        super(`Unrecognized markup type '${markupType}', expected one of: ${accepted.join(', ')}`);
        this.markupType = markupType;
    }
}

/** Representables of different kinds cannot be combined */
export class TypeMismatchError extends MarkupError {}

export class CapacityError extends MarkupError {}

/** Raw point arrangements that do not have the expected shape */
export class MalformedInputError extends MarkupError {}
