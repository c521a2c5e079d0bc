import { z } from 'zod';

// Structural shape of a markups file, as far as reading it is concerned.
// Fields not listed here are carried along but not interpreted.

export const vec3Schema = z.tuple([z.number(), z.number(), z.number()]);

export const controlPointFileSchema = z
    .object({
        id: z.union([z.string(), z.number()]),
        position: vec3Schema,
    })
    .passthrough();

export const markupFileSchema = z
    .object({
        type: z.string(),
        controlPoints: z.array(controlPointFileSchema).default([]),
    })
    .passthrough();

export const markupsFileSchema = z
    .object({
        markups: z.array(markupFileSchema),
    })
    .passthrough();

export type MarkupsFile = z.infer<typeof markupsFileSchema>;
export type MarkupFileEntry = z.infer<typeof markupFileSchema>;
