/**
 * IbgeService — Provedor de municípios a partir da API de localidades do IBGE.
 *
 * Baixa a lista completa de municípios e converte a hierarquia aninhada
 * (microrregião → mesorregião → UF → região) para o formato do catálogo.
 *
 * Os registros normalizados são cacheados no Redis por 30 dias para evitar
 * chamadas repetidas à API do IBGE.
 */

import { z } from "zod";
import { ErroProvedor } from "../../types/erros.js";
import type { OpcoesProvedor, ProvedorMunicipios } from "../../types/contratos.js";
import { FonteCatalogo, type RegistroCidade } from "../../types/index.js";
import { cacheService, type CacheService } from "../cache.service.js";
import { buscarListaJson, listarComCache, texto, textoOuNulo } from "./http.js";

// Lista completa de municípios (todas as UFs)
const IBGE_API_MUNICIPIOS = "https://servicodados.ibge.gov.br/api/v1/localidades/municipios";

const ufIbgeSchema = z.object({
    sigla: z.string().optional(),
    nome: z.string().optional(),
    regiao: z.object({ nome: z.string().optional() }).nullish(),
});

/**
 * Estrutura de um município retornado pela API do IBGE (só os campos usados).
 * Municípios recentes vêm sem microrregião; a UF então é lida da região imediata.
 */
const municipioIbgeSchema = z.object({
    id: z.union([z.number(), z.string()]).optional(),
    nome: z.string().optional(),
    microrregiao: z
        .object({
            nome: z.string().optional(),
            mesorregiao: z
                .object({
                    nome: z.string().optional(),
                    UF: ufIbgeSchema.nullish(),
                })
                .nullish(),
        })
        .nullish(),
    "regiao-imediata": z
        .object({
            "regiao-intermediaria": z.object({ UF: ufIbgeSchema.nullish() }).nullish(),
        })
        .nullish(),
});

type MunicipioIBGE = z.infer<typeof municipioIbgeSchema>;

export class IbgeService implements ProvedorMunicipios {
    readonly fonte = FonteCatalogo.Ibge;

    constructor(
        private readonly cache: CacheService = cacheService,
        private readonly url: string = IBGE_API_MUNICIPIOS
    ) {}

    /**
     * Lista todos os municípios do Brasil.
     *
     * Primeiro tenta o cache Redis (chave catalogo:bruto:ibge); se não houver,
     * consulta a API e grava no cache. Falhas viram ErroProvedor.
     */
    async listarMunicipios(opcoes: OpcoesProvedor): Promise<RegistroCidade[]> {
        return listarComCache(this.cache, this.fonte, opcoes.refresh, async () => {
            const payload = await buscarListaJson(this.url, this.fonte, opcoes.timeoutMs);

            const registros: RegistroCidade[] = [];
            for (const item of payload) {
                const municipio = municipioIbgeSchema.safeParse(item);
                if (!municipio.success) continue;

                const registro = this.normalizar(municipio.data);
                if (registro.ibge_id && registro.name) registros.push(registro);
            }

            if (registros.length === 0) {
                throw new ErroProvedor(`IBGE não retornou registros válidos (${payload.length} itens recebidos)`, this.fonte);
            }

            console.log(`[IbgeService] ${registros.length} municípios recebidos da API`);
            return registros;
        });
    }

    // Converte a hierarquia do IBGE para um registro do catálogo
    private normalizar(municipio: MunicipioIBGE): RegistroCidade {
        const microrregiao = municipio.microrregiao ?? null;
        const mesorregiao = microrregiao?.mesorregiao ?? null;
        const uf = mesorregiao?.UF ?? municipio["regiao-imediata"]?.["regiao-intermediaria"]?.UF ?? null;

        return {
            ibge_id: texto(municipio.id),
            name: texto(municipio.nome),
            uf: texto(uf?.sigla).toUpperCase(),
            state: texto(uf?.nome),
            region: texto(uf?.regiao?.nome),
            mesoregion: textoOuNulo(mesorregiao?.nome),
            microregion: textoOuNulo(microrregiao?.nome),
        };
    }
}

// Exporta como singleton para uso em toda a aplicação
export const ibgeService = new IbgeService();
