// src/core/manifest/manifestSchema.ts

import { z } from 'zod';
import type { CanvasLabel } from '../../@types/index.ts';

const labelSchema = z
    .union([z.string(), z.record(z.string(), z.array(z.string()))])
    .transform((label): CanvasLabel =>
        typeof label === 'string' ? { kind: 'plain', text: label } : { kind: 'localized', values: label }
    );

// Image API 2 services key their id and type with `@`, version 3 without.
const serviceSchema = z
    .object({
        '@id': z.string().optional(),
        id: z.string().optional(),
        '@type': z.string().optional(),
        type: z.string().optional(),
        profile: z.unknown().optional(),
    })
    .transform((service) => ({
        id: service.id ?? service['@id'],
        type: service.type ?? service['@type'],
        profile: service.profile,
    }));

const imageBodySchema = z.object({
    id: z.string().optional(),
    type: z.string().optional(),
    format: z.string().optional(),
    width: z.number().optional(),
    height: z.number().optional(),
    service: z.array(serviceSchema).default([]),
});

const annotationSchema = z.object({
    id: z.string().optional(),
    type: z.string().optional(),
    motivation: z.string().optional(),
    body: imageBodySchema.optional(),
});

const annotationPageSchema = z.object({
    id: z.string().optional(),
    type: z.string().optional(),
    items: z.array(annotationSchema).default([]),
});

const canvasSchema = z.object({
    id: z.string(),
    type: z.string().optional(),
    label: labelSchema,
    width: z.number().optional(),
    height: z.number().optional(),
    items: z.array(annotationPageSchema).default([]),
});

export const manifestSchema = z.object({
    id: z.string().optional(),
    type: z.string().optional(),
    label: labelSchema.optional(),
    items: z.array(canvasSchema),
});
