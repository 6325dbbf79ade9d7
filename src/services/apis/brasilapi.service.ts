/**
 * BrasilApiService — Provedor secundário de municípios (BrasilAPI).
 *
 * A BrasilAPI devolve a lista plana; nome do estado e região vêm da tabela
 * fixa de UFs. Usada como fallback quando o IBGE falha.
 */

import { z } from "zod";
import { ErroProvedor } from "../../types/erros.js";
import type { OpcoesProvedor, ProvedorMunicipios } from "../../types/contratos.js";
import { FonteCatalogo, type RegistroCidade } from "../../types/index.js";
import { UFS } from "../../types/ufs.js";
import { cacheService, type CacheService } from "../cache.service.js";
import { buscarListaJson, listarComCache, numeroOuNulo, texto, textoOuNulo } from "./http.js";

const BRASILAPI_MUNICIPIOS = "https://brasilapi.com.br/api/ibge/municipios/v1";

const textoOuNumero = z.union([z.string(), z.number()]).nullish();

const municipioBrasilApiSchema = z.object({
    codigo_ibge: textoOuNumero,
    codigo: textoOuNumero,
    nome: z.string().nullish(),
    estado: z.string().nullish(),
    uf: z.string().nullish(),
    regiao: z.string().nullish(),
    latitude: textoOuNumero,
    longitude: textoOuNumero,
    capital: z.union([z.boolean(), z.number()]).nullish(),
    siafi_id: textoOuNumero,
    ddd: textoOuNumero,
    fuso_horario: z.string().nullish(),
    timezone: z.string().nullish(),
});

type MunicipioBrasilApi = z.infer<typeof municipioBrasilApiSchema>;

export class BrasilApiService implements ProvedorMunicipios {
    readonly fonte = FonteCatalogo.BrasilApi;

    constructor(
        private readonly cache: CacheService = cacheService,
        private readonly url: string = BRASILAPI_MUNICIPIOS
    ) {}

    async listarMunicipios(opcoes: OpcoesProvedor): Promise<RegistroCidade[]> {
        return listarComCache(this.cache, this.fonte, opcoes.refresh, async () => {
            const payload = await buscarListaJson(this.url, this.fonte, opcoes.timeoutMs);

            const registros = payload.flatMap((item) => {
                const municipio = municipioBrasilApiSchema.safeParse(item);
                if (!municipio.success) return [];
                const registro = this.normalizar(municipio.data);
                return registro.ibge_id && registro.name ? [registro] : [];
            });

            if (registros.length === 0) {
                throw new ErroProvedor(
                    `BrasilAPI não retornou registros válidos (${payload.length} itens recebidos)`,
                    this.fonte
                );
            }

            console.log(`[BrasilApiService] ${registros.length} municípios recebidos da API`);
            return registros;
        });
    }

    private normalizar(municipio: MunicipioBrasilApi): RegistroCidade {
        const uf = texto(municipio.estado ?? municipio.uf).toUpperCase();
        const detalhesUf = UFS[uf];

        return {
            ibge_id: texto(municipio.codigo_ibge ?? municipio.codigo),
            name: texto(municipio.nome),
            uf,
            state: detalhesUf?.nome ?? "",
            region: detalhesUf?.regiao ?? texto(municipio.regiao),
            latitude: numeroOuNulo(municipio.latitude),
            longitude: numeroOuNulo(municipio.longitude),
            capital: Boolean(municipio.capital),
            siafi_id: textoOuNulo(municipio.siafi_id),
            ddd: textoOuNulo(municipio.ddd),
            timezone: textoOuNulo(municipio.fuso_horario ?? municipio.timezone),
        };
    }
}

export const brasilApiService = new BrasilApiService();
