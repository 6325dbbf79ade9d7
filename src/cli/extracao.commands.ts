/**
 * Comandos de extração em lote.
 *
 * Uso:
 *   extracao processar [--lote 500] [--dry-run] [--continuo]
 */

import type { Command } from "commander";
import { env } from "../config/env.js";
import { criarContainer } from "../container.js";
import { STATUS_RESOLUCAO_LABEL, type ResumoLote } from "../types/index.js";

interface ProcessarOptions {
    readonly lote?: string;
    readonly dryRun?: boolean;
    readonly continuo?: boolean;
}

function imprimirResumo(resumo: ResumoLote): void {
    console.log(
        `${resumo.dryRun ? "[dry-run] " : ""}processadas=${resumo.processadas} vazias=${resumo.vazias} ` +
            `atualizadas=${resumo.atualizadas} resolvidas=${resumo.resolvidas} ambíguas=${resumo.ambiguas} ` +
            `estrangeiras=${resumo.estrangeiras} erros=${resumo.erros.length}`
    );
    for (const erro of resumo.erros) {
        console.log(`  erro em ${erro.url}: ${erro.mensagem}`);
    }
    for (const artigo of resumo.previa) {
        console.log(`  ${artigo.url}`);
        for (const cidade of artigo.cidades) {
            const destino = cidade.cidadeId ?? cidade.candidatos.map((c) => `${c.nome}-${c.uf}`).join(" | ");
            console.log(`    [${cidade.inicio}, ${cidade.fim}) "${cidade.superficie}" → ${STATUS_RESOLUCAO_LABEL[cidade.status]} ${destino}`);
        }
    }
}

export function registerExtracaoCommands(program: Command): void {
    const extracao = program.command("extracao").description("Extração de pessoas e cidades das notícias pendentes");

    extracao
        .command("processar")
        .description("Processa o próximo lote de notícias pendentes")
        .option("--lote <tamanho>", "Quantidade de notícias por lote")
        .option("--dry-run", "Executa a resolução sem gravar nada")
        .option("--continuo", "Continua processando lotes até receber SIGINT/SIGTERM")
        .action(async (options: ProcessarOptions) => {
            const tamanhoLote = options.lote ? Number.parseInt(options.lote, 10) : env.EXTRACAO_TAMANHO_LOTE;
            if (!Number.isInteger(tamanhoLote) || tamanhoLote <= 0) {
                console.error(`Tamanho de lote inválido: ${options.lote ?? ""}`);
                process.exitCode = 1;
                return;
            }

            const container = await criarContainer();
            const controle = new AbortController();
            const interromper = () => controle.abort();
            process.once("SIGINT", interromper);
            process.once("SIGTERM", interromper);

            try {
                if (options.continuo) {
                    await container.extracao.executarContinuo({
                        tamanhoLote,
                        dryRun: options.dryRun ?? false,
                        sinal: controle.signal,
                        intervaloMs: env.EXTRACAO_INTERVALO_SEGUNDOS * 1000,
                        aoConcluirLote: imprimirResumo,
                    });
                } else {
                    const resumo = await container.extracao.processarLote({
                        tamanhoLote,
                        dryRun: options.dryRun ?? false,
                        sinal: controle.signal,
                    });
                    imprimirResumo(resumo);
                    if (resumo.erros.length > 0) process.exitCode = 1;
                }
            } finally {
                process.off("SIGINT", interromper);
                process.off("SIGTERM", interromper);
                await container.encerrar();
            }
        });
}
