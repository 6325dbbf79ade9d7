import { z } from "zod";
import { FonteCatalogo } from "./index.js";

export const registroCidadeSchema = z.object({
    ibge_id: z.string().min(1),
    name: z.string().min(1),
    uf: z.string(),
    state: z.string(),
    region: z.string(),
    alt_names: z.array(z.string()).optional(),
    latitude: z.number().nullable().optional(),
    longitude: z.number().nullable().optional(),
    capital: z.boolean().optional(),
    siafi_id: z.string().nullable().optional(),
    ddd: z.string().nullable().optional(),
    timezone: z.string().nullable().optional(),
    mesoregion: z.string().nullable().optional(),
    microregion: z.string().nullable().optional(),
});

export const metadadosCatalogoSchema = z.object({
    version: z.string().regex(/^v\d+$/),
    source: z.nativeEnum(FonteCatalogo),
    primary_source: z.nativeEnum(FonteCatalogo),
    downloaded_at: z.string().datetime(),
    record_count: z.number().int().nonnegative(),
    checksum: z.string().regex(/^[0-9a-f]{64}$/),
});

export const arquivoCatalogoSchema = z.object({
    metadata: metadadosCatalogoSchema,
    records: z.array(registroCidadeSchema),
});
