/**
 * ExtracaoService — Processamento em lote das notícias pendentes.
 *
 * Para cada notícia: NER → pessoas (canal lateral) → resolução de cidades →
 * gravação numa única transação do gravador → marca como processada.
 * Um artigo com erro é registrado via marcarErro e o lote segue.
 * Em dry-run nada é gravado: o resumo traz a prévia das ocorrências.
 */

import { setTimeout as esperar } from "node:timers/promises";
import type { GravadorResultados, MotorNer, RepositorioNoticias } from "../types/contratos.js";
import { ErroProcessamentoArtigo } from "../types/erros.js";
import {
    RotuloEntidade,
    StatusResolucao,
    type NoticiaPendente,
    type PessoaDetectada,
    type ResultadoArtigo,
    type ResumoLote,
    type TrechoEntidade,
} from "../types/index.js";
import { agregarCidades } from "./agregacao.service.js";
import { normalizadorService, type NormalizadorService } from "./normalizador.service.js";
import type { ResolucaoService } from "./resolucao.service.js";

const TAMANHO_LOTE_PADRAO = 500;

export interface DependenciasExtracao {
    repositorio: RepositorioNoticias;
    gravador: GravadorResultados;
    motorNer: MotorNer;
    resolucao: ResolucaoService;
    normalizador?: NormalizadorService;
    tamanhoLote?: number;
    agora?: () => Date;
}

export interface OpcoesLote {
    tamanhoLote?: number;
    dryRun?: boolean;
    // Interrompe o agendamento de novos artigos (o artigo em andamento termina)
    sinal?: AbortSignal;
}

export interface OpcoesExecucaoContinua extends OpcoesLote {
    intervaloMs: number;
    aoConcluirLote?: (resumo: ResumoLote) => void;
}

function descreverErro(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}

export class ExtracaoService {
    private readonly repositorio: RepositorioNoticias;
    private readonly gravador: GravadorResultados;
    private readonly motorNer: MotorNer;
    private readonly resolucao: ResolucaoService;
    private readonly normalizador: NormalizadorService;
    private readonly tamanhoLote: number;
    private readonly agora: () => Date;

    constructor(deps: DependenciasExtracao) {
        this.repositorio = deps.repositorio;
        this.gravador = deps.gravador;
        this.motorNer = deps.motorNer;
        this.resolucao = deps.resolucao;
        this.normalizador = deps.normalizador ?? normalizadorService;
        this.tamanhoLote = deps.tamanhoLote ?? TAMANHO_LOTE_PADRAO;
        this.agora = deps.agora ?? (() => new Date());
    }

    get versaoNer(): string {
        return this.resolucao.versaoNer;
    }

    get versaoGazetteer(): string {
        return this.resolucao.versaoGazetteer;
    }

    // Título e corpo aparados, unidos por quebra de linha e sem boilerplate
    textoAnalisado(noticia: Pick<NoticiaPendente, "titulo" | "corpo">): string {
        const partes = [noticia.titulo.trim(), noticia.corpo.trim()].filter(Boolean);
        return this.normalizador.normalizarTexto(partes.join("\n"));
    }

    /**
     * Analisa uma notícia sem gravar nada: pessoas, ocorrências de cidades
     * e o resumo por cidade.
     */
    async analisarArtigo(noticia: Pick<NoticiaPendente, "url" | "titulo" | "corpo">): Promise<ResultadoArtigo> {
        const texto = this.textoAnalisado(noticia);
        const entidades = await this.motorNer.analisar(texto);

        const pessoas = this.extrairPessoas(noticia.url, texto, entidades);
        const cidades = this.resolucao.resolver({ url: noticia.url, texto }, entidades);

        return { url: noticia.url, pessoas, cidades, resumo: agregarCidades(cidades) };
    }

    /**
     * Processa o próximo lote de notícias pendentes para as versões atuais.
     */
    async processarLote(opcoes: OpcoesLote = {}): Promise<ResumoLote> {
        const dryRun = opcoes.dryRun ?? false;
        const tamanho = opcoes.tamanhoLote ?? this.tamanhoLote;

        const resumo: ResumoLote = {
            processadas: 0,
            vazias: 0,
            atualizadas: 0,
            resolvidas: 0,
            ambiguas: 0,
            estrangeiras: 0,
            erros: [],
            dryRun,
            previa: [],
        };

        const pendentes = await this.repositorio.buscarPendentes(tamanho, this.versaoNer, this.versaoGazetteer);

        for (const noticia of pendentes) {
            if (opcoes.sinal?.aborted) {
                console.log("[ExtracaoService] Interrupção solicitada, encerrando o lote antes do próximo artigo");
                break;
            }

            try {
                if (!noticia.titulo.trim() && !noticia.corpo.trim()) {
                    resumo.vazias += 1;
                    if (!dryRun) await this.marcarProcessada(noticia.url);
                    continue;
                }

                const resultado = await this.analisarArtigo(noticia);

                for (const ocorrencia of resultado.cidades) {
                    if (ocorrencia.status === StatusResolucao.Resolvida) resumo.resolvidas += 1;
                    else if (ocorrencia.status === StatusResolucao.Ambigua) resumo.ambiguas += 1;
                    else resumo.estrangeiras += 1;
                }

                if (dryRun) {
                    resumo.previa.push(resultado);
                } else {
                    resumo.atualizadas += await this.persistir(resultado);
                    await this.marcarProcessada(noticia.url);
                }

                resumo.processadas += 1;
            } catch (err) {
                await this.registrarErro(resumo, noticia.url, err, dryRun);
            }
        }

        console.log(
            `[ExtracaoService] Lote concluído${dryRun ? " (dry-run)" : ""}: ${resumo.processadas} processadas, ` +
                `${resumo.vazias} vazias, ${resumo.erros.length} erros, ${resumo.resolvidas} resolvidas, ` +
                `${resumo.ambiguas} ambíguas, ${resumo.estrangeiras} estrangeiras`
        );

        return resumo;
    }

    /**
     * Processa lotes em sequência até o sinal ser abortado; quando um lote
     * não avança nenhuma notícia, espera `intervaloMs` antes de consultar de novo.
     */
    async executarContinuo(opcoes: OpcoesExecucaoContinua): Promise<void> {
        const { intervaloMs, aoConcluirLote, ...opcoesLote } = opcoes;

        while (!opcoes.sinal?.aborted) {
            const resumo = await this.processarLote(opcoesLote);
            aoConcluirLote?.(resumo);

            if (opcoes.sinal?.aborted) break;
            // Lote com progresso emenda no próximo; vazio, só com erros ou em dry-run espera o intervalo
            const avancou = resumo.processadas + resumo.vazias > 0;
            if (avancou && !resumo.dryRun) continue;

            try {
                await esperar(intervaloMs, undefined, { signal: opcoes.sinal });
            } catch (err) {
                if (err instanceof Error && err.name === "AbortError") break;
                throw err;
            }
        }
    }

    // Pessoas reconhecidas pelo NER, com nome canonizado (offsets inválidos são ignorados)
    private extrairPessoas(url: string, texto: string, entidades: TrechoEntidade[]): PessoaDetectada[] {
        const pessoas: PessoaDetectada[] = [];

        for (const entidade of entidades) {
            if (entidade.rotulo !== RotuloEntidade.Pessoa) continue;
            if (entidade.inicio < 0 || entidade.inicio >= entidade.fim || entidade.fim > texto.length) {
                console.warn(
                    `[ExtracaoService] Pessoa "${entidade.texto}" com offsets inválidos [${entidade.inicio}, ${entidade.fim}) em ${url}`
                );
                continue;
            }

            const { nomeCanonico, aliases } = this.normalizador.normalizarNomePessoa(entidade.texto);
            if (!nomeCanonico) continue;

            pessoas.push({
                artigoUrl: url,
                nomeCanonico,
                aliases: [...aliases],
                superficie: entidade.texto,
                inicio: entidade.inicio,
                fim: entidade.fim,
                frase: this.normalizador.extrairFrase(texto, entidade.inicio, entidade.fim),
                metodo: entidade.metodo,
                confianca: entidade.confianca,
            });
        }

        return pessoas;
    }

    // Grava tudo do artigo numa transação; retorna quantas ocorrências foram gravadas
    private async persistir(resultado: ResultadoArtigo): Promise<number> {
        return this.gravador.transacao(async (gravador) => {
            await gravador.removerOcorrenciasObsoletas(resultado.url, this.versaoNer, this.versaoGazetteer);

            let gravadas = 0;
            const idsPessoas = new Map<string, string>();

            for (const pessoa of resultado.pessoas) {
                let pessoaId = idsPessoas.get(pessoa.nomeCanonico);
                if (!pessoaId) {
                    const aliasesDoArtigo = resultado.pessoas
                        .filter((outra) => outra.nomeCanonico === pessoa.nomeCanonico)
                        .flatMap((outra) => outra.aliases);
                    pessoaId = await gravador.garantirPessoa(pessoa.nomeCanonico, new Set(aliasesDoArtigo));
                    idsPessoas.set(pessoa.nomeCanonico, pessoaId);
                }

                const { aliases: _aliases, ...ocorrencia } = pessoa;
                await gravador.registrarOcorrenciaPessoa({ ...ocorrencia, pessoaId });
                gravadas += 1;
            }

            for (const ocorrencia of resultado.cidades) {
                await gravador.registrarOcorrenciaCidade(ocorrencia);
                gravadas += 1;
            }

            await gravador.registrarCidadesArtigo(resultado.url, resultado.resumo);
            return gravadas;
        });
    }

    private async marcarProcessada(url: string): Promise<void> {
        await this.repositorio.marcarProcessada(url, this.versaoNer, this.versaoGazetteer, this.agora());
    }

    private async registrarErro(resumo: ResumoLote, url: string, causa: unknown, dryRun: boolean): Promise<void> {
        const erro = new ErroProcessamentoArtigo(url, causa);
        const mensagem = descreverErro(causa);
        console.error(`[ExtracaoService] ${erro.message}`);
        resumo.erros.push({ url, mensagem });

        if (dryRun) return;

        try {
            await this.repositorio.marcarErro(url, mensagem);
        } catch (falha) {
            console.error(`[ExtracaoService] Não foi possível registrar o erro de ${url}:`, descreverErro(falha));
        }
    }
}
