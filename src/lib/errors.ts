export type CoordinateField = "latitude" | "longitude";

/** A coordinate that could not be read as a number. Ends the dispatch. */
export class CoercionError extends Error {
    readonly field: CoordinateField;
    readonly raw: string;

    constructor(field: CoordinateField, raw: unknown) {
        const shown = String(raw);
        super(`Could not convert ${field} to a number: "${shown}"`);
        this.name = "CoercionError";
        this.field = field;
        this.raw = shown;
    }
}
