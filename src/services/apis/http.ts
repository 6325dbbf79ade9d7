/**
 * Utilitários compartilhados pelos provedores de municípios:
 * download de lista JSON com timeout e cache Redis dos registros normalizados.
 */

import { z } from "zod";
import { ErroProvedor } from "../../types/erros.js";
import type { FonteCatalogo, RegistroCidade } from "../../types/index.js";
import { registroCidadeSchema } from "../../types/schemas.js";
import type { CacheService } from "../cache.service.js";

// TTL do cache de municípios: 30 dias em segundos (dados do IBGE mudam raramente)
export const CACHE_TTL_MUNICIPIOS = 30 * 24 * 60 * 60;

const registrosCacheSchema = z.array(registroCidadeSchema);

export function chaveCacheBruto(fonte: FonteCatalogo): string {
    return `catalogo:bruto:${fonte}`;
}

function descreverErro(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

/**
 * Faz GET em `url` e devolve o payload, que precisa ser uma lista JSON.
 * Qualquer falha (rede, timeout, HTTP não-2xx, JSON inválido) vira ErroProvedor.
 */
export async function buscarListaJson(url: string, fonte: FonteCatalogo, timeoutMs: number): Promise<unknown[]> {
    let response: Response;
    try {
        response = await fetch(url, {
            headers: { Accept: "application/json" },
            signal: AbortSignal.timeout(timeoutMs),
        });
    } catch (err) {
        if (err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError")) {
            throw new ErroProvedor(`Tempo esgotado (${timeoutMs} ms) ao consultar ${url}`, fonte, { cause: err });
        }
        throw new ErroProvedor(`Falha ao acessar ${url}: ${descreverErro(err)}`, fonte, { cause: err });
    }

    if (!response.ok) {
        throw new ErroProvedor(`HTTP ${response.status} ao consultar ${url}`, fonte);
    }

    let payload: unknown;
    try {
        payload = await response.json();
    } catch (err) {
        throw new ErroProvedor(`Resposta inválida de ${url}: JSON não pôde ser decodificado`, fonte, { cause: err });
    }

    if (!Array.isArray(payload)) {
        throw new ErroProvedor(`Resposta inesperada de ${url}: era esperada uma lista`, fonte);
    }

    return payload;
}

/**
 * Lê os registros normalizados do cache (chave catalogo:bruto:{fonte}) ou
 * baixa com `baixar` e grava no cache por 30 dias. `refresh` descarta o cache.
 */
export async function listarComCache(
    cache: CacheService,
    fonte: FonteCatalogo,
    refresh: boolean,
    baixar: () => Promise<RegistroCidade[]>
): Promise<RegistroCidade[]> {
    const chave = chaveCacheBruto(fonte);

    if (refresh) {
        await cache.del(chave);
    } else {
        const cached = registrosCacheSchema.safeParse(await cache.get(chave));
        if (cached.success && cached.data.length > 0) {
            console.log(`[Provedor:${fonte}] ${cached.data.length} municípios lidos do cache`);
            return cached.data;
        }
    }

    const registros = await baixar();
    await cache.set(chave, registros, CACHE_TTL_MUNICIPIOS);
    return registros;
}

// Converte um valor vindo da API em texto aparado ("" quando ausente)
export function texto(valor: unknown): string {
    if (typeof valor === "string") return valor.trim();
    if (typeof valor === "number" && Number.isFinite(valor)) return String(valor);
    return "";
}

// Texto opcional: vazio vira null
export function textoOuNulo(valor: unknown): string | null {
    const convertido = texto(valor);
    return convertido ? convertido : null;
}

// Coordenada numérica ou null ("", null e valores não numéricos)
export function numeroOuNulo(valor: unknown): number | null {
    if (valor === null || valor === undefined || valor === "") return null;
    const numero = typeof valor === "number" ? valor : Number(valor);
    return Number.isFinite(numero) ? numero : null;
}
