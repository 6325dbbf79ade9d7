/**
 * Gazetteer — Índice em memória dos municípios do catálogo versionado.
 *
 * Nomes e nomes alternativos são indexados pela mesma chave normalizada
 * (minúsculo, sem acento, espaços colapsados). Depois de construído o índice
 * não muda, então a mesma instância pode ser compartilhada entre resoluções.
 */

import type { RegistroCidade } from "../types/index.js";
import { normalizadorService, type NormalizadorService } from "./normalizador.service.js";

// Apóstrofos tipográficos viram o ASCII antes de gerar a chave
const REGEX_APOSTROFOS = /[\u2018\u2019\u02BC`\u00B4]/g;
const REGEX_HIFENS = /[-\u2010-\u2015]/g;

// Capitais primeiro, depois código IBGE numérico
function compararRegistros(a: RegistroCidade, b: RegistroCidade): number {
    const capitalA = a.capital ? 0 : 1;
    const capitalB = b.capital ? 0 : 1;
    if (capitalA !== capitalB) return capitalA - capitalB;

    const idA = Number(a.ibge_id);
    const idB = Number(b.ibge_id);
    if (Number.isFinite(idA) && Number.isFinite(idB) && idA !== idB) return idA - idB;

    return a.ibge_id.localeCompare(b.ibge_id);
}

export class Gazetteer {
    private readonly indice = new Map<string, RegistroCidade[]>();
    private readonly porId = new Map<string, RegistroCidade>();

    constructor(
        registros: Iterable<RegistroCidade>,
        readonly versao: string = "dev",
        private readonly normalizador: NormalizadorService = normalizadorService
    ) {
        for (const registro of registros) {
            // Primeiro registro com o id vence (mesma regra do catálogo)
            if (this.porId.has(registro.ibge_id)) continue;
            this.porId.set(registro.ibge_id, registro);

            const variantes = [registro.name, ...(registro.alt_names ?? [])];
            const chaves = new Set(variantes.map((nome) => this.chave(nome)).filter(Boolean));

            for (const chave of chaves) {
                const lista = this.indice.get(chave);
                if (lista) {
                    lista.push(registro);
                } else {
                    this.indice.set(chave, [registro]);
                }
            }
        }

        for (const lista of this.indice.values()) {
            lista.sort(compararRegistros);
        }
    }

    get total(): number {
        return this.porId.size;
    }

    // Registros na ordem de carga, sem ids repetidos
    registros(): IterableIterator<RegistroCidade> {
        return this.porId.values();
    }

    obter(ibgeId: string): RegistroCidade | undefined {
        return this.porId.get(ibgeId);
    }

    /**
     * Busca candidatos pelo nome.
     *
     * Com `ufHint`, filtra pela UF; se o filtro não sobrar nada, devolve o
     * conjunto completo (a dica pode estar errada).
     */
    buscar(nome: string, ufHint?: string | null): RegistroCidade[] {
        const candidatos = this.indice.get(this.chave(nome)) ?? [];
        if (candidatos.length === 0) return [];

        if (ufHint) {
            const uf = ufHint.toUpperCase();
            const filtrados = candidatos.filter((registro) => registro.uf === uf);
            if (filtrados.length > 0) return filtrados;
        }

        return [...candidatos];
    }

    private chave(nome: string): string {
        return this.normalizador.normalizar(
            nome.replace(REGEX_APOSTROFOS, "'").replace(REGEX_HIFENS, " ")
        );
    }
}
