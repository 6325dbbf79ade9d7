/**
 * Comandos do catálogo de municípios.
 *
 * Uso:
 *   catalogo construir [--fonte ibge|brasilapi] [--versao v1] [--refresh] [--saida arquivo.json]
 *   catalogo verificar <arquivo>
 */

import type { Command } from "commander";
import { z } from "zod";
import { criarCatalogoService } from "../container.js";
import { cacheService } from "../services/cache.service.js";
import { FonteCatalogo, type MetadadosCatalogo } from "../types/index.js";

interface ConstruirOptions {
    readonly fonte?: string;
    readonly versao?: string;
    readonly refresh?: boolean;
    readonly saida?: string;
}

const fonteSchema = z.nativeEnum(FonteCatalogo).optional();

function imprimirMetadados(metadata: MetadadosCatalogo): void {
    console.log(`  versão:          ${metadata.version}`);
    console.log(`  fonte efetiva:   ${metadata.source} (primária: ${metadata.primary_source})`);
    console.log(`  baixado em:      ${metadata.downloaded_at}`);
    console.log(`  municípios:      ${metadata.record_count}`);
    console.log(`  checksum:        ${metadata.checksum}`);
}

export function registerCatalogoCommands(program: Command): void {
    const catalogo = program.command("catalogo").description("Catálogo versionado de municípios brasileiros");

    catalogo
        .command("construir")
        .description("Baixa os municípios (IBGE com fallback para BrasilAPI) e grava o catálogo")
        .option("--fonte <fonte>", "Fonte primária (ibge | brasilapi)")
        .option("--versao <versao>", "Versão do catálogo (ex: v1)")
        .option("--refresh", "Sobrescreve o arquivo existente e ignora o cache")
        .option("--saida <arquivo>", "Caminho do arquivo de saída")
        .action(async (options: ConstruirOptions) => {
            const fonte = fonteSchema.safeParse(options.fonte);
            if (!fonte.success) {
                console.error(`Fonte inválida: ${options.fonte ?? ""} (use ibge ou brasilapi)`);
                process.exitCode = 1;
                return;
            }

            try {
                const metadata = await criarCatalogoService().construir({
                    fonte: fonte.data,
                    versao: options.versao,
                    refresh: options.refresh ?? false,
                    saida: options.saida,
                });
                console.log("Catálogo pronto:");
                imprimirMetadados(metadata);
            } catch (error) {
                console.error(`Falha ao gerar o catálogo: ${error instanceof Error ? error.message : String(error)}`);
                process.exitCode = 1;
            } finally {
                await cacheService.desconectar();
            }
        });

    catalogo
        .command("verificar")
        .description("Valida formato, quantidade de registros e checksum de um arquivo de catálogo")
        .argument("<arquivo>", "Arquivo municipios_br_<versao>.json")
        .action(async (arquivo: string) => {
            try {
                const { metadata } = await criarCatalogoService().carregar(arquivo);
                console.log(`Catálogo ${arquivo} íntegro:`);
                imprimirMetadados(metadata);
            } catch (error) {
                console.error(`Catálogo inválido: ${error instanceof Error ? error.message : String(error)}`);
                process.exitCode = 1;
            }
        });
}
