/**
 * CatalogoService — Construção e leitura do catálogo versionado de municípios.
 *
 * Fluxo de construção:
 * 1. Consulta o provedor primário; em falha (ou lista truncada) tenta o próximo
 * 2. Limpa os registros: descarta sem id/nome, deduplica por ibge_id
 *    (primeiro visto vence) e ordena por ibge_id numérico
 * 3. Calcula o SHA-256 da serialização canônica (chaves ordenadas, sem espaços)
 * 4. Grava `municipios_br_<versao>.json` em arquivo temporário e renomeia
 *
 * O mesmo conjunto de registros gera sempre o mesmo arquivo e o mesmo checksum
 * (exceto `downloaded_at`).
 */

import { createHash } from "node:crypto";
import { mkdir, readFile, rename, stat, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { ProvedorMunicipios } from "../types/contratos.js";
import { ErroIntegridadeCatalogo, ErroProvedor } from "../types/erros.js";
import type { ArquivoCatalogo, FonteCatalogo, MetadadosCatalogo, RegistroCidade } from "../types/index.js";
import { arquivoCatalogoSchema } from "../types/schemas.js";
import { Gazetteer } from "./gazetteer.service.js";

const REGEX_VERSAO = /^v\d+$/;

// Registros crus, usados para recalcular o checksum exatamente como gravado
const registrosCrusSchema = z.object({ records: z.array(z.unknown()) });

export interface ConfigCatalogo {
    diretorio: string;
    versao: string;
    fontePrimaria: FonteCatalogo;
    minimoRegistros: number;
    timeoutMs: number;
}

export interface OpcoesConstrucao {
    fonte?: FonteCatalogo;
    versao?: string;
    refresh?: boolean;
    // Caminho explícito do arquivo (padrão: <diretorio>/municipios_br_<versao>.json)
    saida?: string;
}

/**
 * Copia o valor com as chaves de todos os objetos em ordem lexicográfica.
 */
export function ordenarChaves(valor: unknown): unknown {
    if (Array.isArray(valor)) {
        return valor.map(ordenarChaves);
    }
    if (valor !== null && typeof valor === "object") {
        const entradas = Object.entries(valor).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
        return Object.fromEntries(entradas.map(([chave, item]) => [chave, ordenarChaves(item)]));
    }
    return valor;
}

export function calcularChecksum(registros: unknown[]): string {
    return createHash("sha256").update(JSON.stringify(ordenarChaves(registros)), "utf8").digest("hex");
}

// Ordena ids numéricos pelo valor; ids não numéricos por texto, depois pelo nome
function compararRegistros(a: RegistroCidade, b: RegistroCidade): number {
    const numericoA = /^\d+$/.test(a.ibge_id);
    const numericoB = /^\d+$/.test(b.ibge_id);

    if (numericoA && numericoB) {
        const diferenca = Number(a.ibge_id) - Number(b.ibge_id);
        if (diferenca !== 0) return diferenca;
    } else if (numericoA !== numericoB) {
        return numericoA ? -1 : 1;
    } else if (a.ibge_id !== b.ibge_id) {
        return a.ibge_id < b.ibge_id ? -1 : 1;
    }

    return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

/**
 * Descarta registros sem ibge_id ou nome, deduplica por ibge_id
 * (o primeiro visto vence) e ordena.
 */
export function limparRegistros(registros: RegistroCidade[]): RegistroCidade[] {
    const porId = new Map<string, RegistroCidade>();

    for (const registro of registros) {
        const ibgeId = registro.ibge_id.trim();
        const nome = registro.name.trim();
        if (!ibgeId || !nome) continue;
        if (porId.has(ibgeId)) continue;

        porId.set(ibgeId, { ...registro, ibge_id: ibgeId, name: nome });
    }

    return [...porId.values()].sort(compararRegistros);
}

async function existe(caminho: string): Promise<boolean> {
    try {
        await stat(caminho);
        return true;
    } catch {
        return false;
    }
}

function descreverErro(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

export class CatalogoService {
    constructor(
        private readonly provedores: ProvedorMunicipios[],
        private readonly config: ConfigCatalogo,
        private readonly agora: () => Date = () => new Date()
    ) {}

    caminhoArquivo(versao: string = this.config.versao): string {
        return path.join(this.config.diretorio, `municipios_br_${versao}.json`);
    }

    /**
     * Constrói (ou reaproveita) o arquivo de catálogo e devolve seus metadados.
     *
     * @throws ErroProvedor quando nenhum provedor responde
     * @throws ErroIntegridadeCatalogo quando as listas obtidas ficam abaixo do mínimo
     */
    async construir(opcoes: OpcoesConstrucao = {}): Promise<MetadadosCatalogo> {
        const versao = opcoes.versao ?? this.config.versao;
        if (!REGEX_VERSAO.test(versao)) {
            throw new RangeError(`Versão de catálogo inválida: "${versao}" (esperado v<número>)`);
        }

        const fontePrimaria = opcoes.fonte ?? this.config.fontePrimaria;
        const refresh = opcoes.refresh ?? false;
        const caminho = opcoes.saida ?? this.caminhoArquivo(versao);

        // Arquivo existente só é sobrescrito com --refresh
        if (!refresh && (await existe(caminho))) {
            const existente = await this.carregar(caminho);
            console.log(`[CatalogoService] Catálogo ${caminho} já existe; use --refresh para sobrescrever`);
            return existente.metadata;
        }

        const { registros, fonte } = await this.obterRegistros(fontePrimaria, refresh);

        const metadata: MetadadosCatalogo = {
            version: versao,
            source: fonte,
            primary_source: fontePrimaria,
            downloaded_at: this.agora().toISOString(),
            record_count: registros.length,
            checksum: calcularChecksum(registros),
        };

        await this.gravar(caminho, { metadata, records: registros });

        console.log(
            `[CatalogoService] Catálogo salvo em ${caminho} com ${registros.length} municípios (fonte efetiva: ${fonte})`
        );

        return metadata;
    }

    /**
     * Lê e valida um arquivo de catálogo: formato, quantidade de registros
     * e checksum recalculado.
     */
    async carregar(caminho: string = this.caminhoArquivo()): Promise<ArquivoCatalogo> {
        let bruto: unknown;
        try {
            bruto = JSON.parse(await readFile(caminho, "utf8"));
        } catch (err) {
            if (err instanceof SyntaxError) {
                throw new ErroIntegridadeCatalogo(`Catálogo ${caminho} não é um JSON válido: ${err.message}`);
            }
            throw err;
        }

        const arquivo = arquivoCatalogoSchema.safeParse(bruto);
        if (!arquivo.success) {
            const detalhes = arquivo.error.issues
                .slice(0, 3)
                .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
                .join("; ");
            throw new ErroIntegridadeCatalogo(`Catálogo ${caminho} com formato inválido (${detalhes})`);
        }

        const { metadata, records } = arquivo.data;

        if (metadata.record_count !== records.length) {
            throw new ErroIntegridadeCatalogo(
                `Catálogo ${caminho} declara ${metadata.record_count} registros mas contém ${records.length}`
            );
        }

        const checksum = calcularChecksum(registrosCrusSchema.parse(bruto).records);
        if (checksum !== metadata.checksum) {
            throw new ErroIntegridadeCatalogo(`Checksum do catálogo ${caminho} não confere (${checksum} ≠ ${metadata.checksum})`);
        }

        return { metadata, records };
    }

    // Carrega o catálogo e monta o gazetteer com a versão gravada nos metadados
    async carregarGazetteer(caminho?: string): Promise<Gazetteer> {
        const { metadata, records } = await this.carregar(caminho);
        return new Gazetteer(records, metadata.version);
    }

    private async obterRegistros(
        fontePrimaria: FonteCatalogo,
        refresh: boolean
    ): Promise<{ registros: RegistroCidade[]; fonte: FonteCatalogo }> {
        const ordem = [
            ...this.provedores.filter((provedor) => provedor.fonte === fontePrimaria),
            ...this.provedores.filter((provedor) => provedor.fonte !== fontePrimaria),
        ];

        const erros: string[] = [];
        let truncado = false;

        for (const provedor of ordem) {
            try {
                const registros = limparRegistros(
                    await provedor.listarMunicipios({ timeoutMs: this.config.timeoutMs, refresh })
                );

                if (registros.length < this.config.minimoRegistros) {
                    truncado = true;
                    const mensagem = `${registros.length} registros, mínimo ${this.config.minimoRegistros}`;
                    console.warn(`[CatalogoService] Fonte ${provedor.fonte} retornou lista truncada (${mensagem})`);
                    erros.push(`${provedor.fonte}: ${mensagem}`);
                    continue;
                }

                console.log(`[CatalogoService] Fonte ${provedor.fonte} retornou ${registros.length} municípios`);
                return { registros, fonte: provedor.fonte };
            } catch (err) {
                console.warn(`[CatalogoService] Falha ao usar fonte ${provedor.fonte}:`, descreverErro(err));
                erros.push(`${provedor.fonte}: ${descreverErro(err)}`);
            }
        }

        const resumo = erros.length > 0 ? erros.join("; ") : "nenhum provedor configurado";
        if (truncado) {
            throw new ErroIntegridadeCatalogo(`Catálogo abaixo do mínimo de registros, nada foi publicado (${resumo})`);
        }
        throw new ErroProvedor(`Não foi possível obter o catálogo de municípios (${resumo})`);
    }

    private async gravar(caminho: string, arquivo: ArquivoCatalogo): Promise<void> {
        await mkdir(path.dirname(caminho), { recursive: true });

        const temporario = `${caminho}.${process.pid}.tmp`;
        await writeFile(temporario, `${JSON.stringify(ordenarChaves(arquivo), null, 2)}\n`, "utf8");
        await rename(temporario, caminho);
    }
}
