/**
 * Adaptadores em memória das portas de notícias e de resultados.
 *
 * Usados pelo servidor quando não há PostgreSQL configurado e nos testes.
 * O estado vive só no processo: reiniciar apaga fila e resultados.
 */

import { randomUUID } from "node:crypto";
import type { GravadorResultados, RepositorioNoticias } from "../types/contratos.js";
import type {
    NoticiaPendente,
    OcorrenciaCidade,
    OcorrenciaPessoa,
    ResumoCidadesArtigo,
} from "../types/index.js";

interface EstadoNoticia {
    noticia: NoticiaPendente;
    versaoNer: string | null;
    versaoGazetteer: string | null;
    processadaEm: Date | null;
    erro: string | null;
}

export interface SituacaoNoticia {
    url: string;
    titulo: string;
    versaoNer: string | null;
    versaoGazetteer: string | null;
    processadaEm: Date | null;
    erro: string | null;
}

/**
 * Fila de notícias pendentes. Uma notícia é pendente enquanto não foi
 * processada com as versões atuais de NER e gazetteer.
 */
export class RepositorioNoticiasMemoria implements RepositorioNoticias {
    private readonly noticias = new Map<string, EstadoNoticia>();

    /**
     * Adiciona (ou substitui) notícias na fila. Reenfileirar a mesma URL
     * zera as versões e força novo processamento.
     */
    enfileirar(noticias: NoticiaPendente[]): number {
        for (const noticia of noticias) {
            this.noticias.set(noticia.url, {
                noticia: { ...noticia, versaoNer: null, versaoGazetteer: null },
                versaoNer: null,
                versaoGazetteer: null,
                processadaEm: null,
                erro: null,
            });
        }
        return noticias.length;
    }

    async buscarPendentes(tamanho: number, versaoNer: string, versaoGazetteer: string): Promise<NoticiaPendente[]> {
        return [...this.noticias.values()]
            .filter((estado) => estado.versaoNer !== versaoNer || estado.versaoGazetteer !== versaoGazetteer)
            .sort(
                (a, b) =>
                    a.noticia.publicadaEm.getTime() - b.noticia.publicadaEm.getTime() ||
                    (a.noticia.url < b.noticia.url ? -1 : a.noticia.url > b.noticia.url ? 1 : 0)
            )
            .slice(0, tamanho)
            .map((estado) => ({
                ...estado.noticia,
                versaoNer: estado.versaoNer,
                versaoGazetteer: estado.versaoGazetteer,
            }));
    }

    async marcarProcessada(url: string, versaoNer: string, versaoGazetteer: string, em: Date): Promise<void> {
        const estado = this.noticias.get(url);
        if (!estado) return;
        estado.versaoNer = versaoNer;
        estado.versaoGazetteer = versaoGazetteer;
        estado.processadaEm = em;
        estado.erro = null;
    }

    // O erro fica registrado e as versões não mudam: a notícia volta no próximo lote
    async marcarErro(url: string, mensagem: string): Promise<void> {
        const estado = this.noticias.get(url);
        if (!estado) return;
        estado.erro = mensagem;
    }

    situacao(url: string): SituacaoNoticia | null {
        const estado = this.noticias.get(url);
        if (!estado) return null;
        return {
            url,
            titulo: estado.noticia.titulo,
            versaoNer: estado.versaoNer,
            versaoGazetteer: estado.versaoGazetteer,
            processadaEm: estado.processadaEm,
            erro: estado.erro,
        };
    }

    get total(): number {
        return this.noticias.size;
    }
}

interface RegistroPessoa {
    id: string;
    nomeCanonico: string;
    aliases: Set<string>;
}

interface EstadoResultados {
    pessoas: Map<string, RegistroPessoa>;
    ocorrenciasPessoa: Map<string, Map<string, OcorrenciaPessoa>>;
    ocorrenciasCidade: Map<string, Map<string, OcorrenciaCidade>>;
    cidadesArtigo: Map<string, ResumoCidadesArtigo>;
}

export interface ResultadosArtigo {
    url: string;
    pessoas: OcorrenciaPessoa[];
    cidades: OcorrenciaCidade[];
    resumo: ResumoCidadesArtigo | null;
}

function chaveOcorrencia(inicio: number, fim: number): string {
    return `${inicio}:${fim}`;
}

function ordenarPorOffset<T extends { inicio: number; fim: number }>(itens: Iterable<T>): T[] {
    return [...itens].sort((a, b) => a.inicio - b.inicio || a.fim - b.fim);
}

/**
 * Armazém de resultados. Ocorrências são únicas por (url, inicio, fim):
 * gravar de novo a mesma chave substitui a anterior.
 */
export class ArmazemResultadosMemoria implements GravadorResultados {
    private estado: EstadoResultados = {
        pessoas: new Map(),
        ocorrenciasPessoa: new Map(),
        ocorrenciasCidade: new Map(),
        cidadesArtigo: new Map(),
    };
    private filaTransacoes: Promise<void> = Promise.resolve();

    async garantirPessoa(nomeCanonico: string, aliases: Iterable<string>): Promise<string> {
        let pessoa = this.estado.pessoas.get(nomeCanonico);
        if (!pessoa) {
            pessoa = { id: randomUUID(), nomeCanonico, aliases: new Set() };
            this.estado.pessoas.set(nomeCanonico, pessoa);
        }
        for (const alias of aliases) pessoa.aliases.add(alias);
        return pessoa.id;
    }

    async registrarOcorrenciaPessoa(ocorrencia: OcorrenciaPessoa): Promise<void> {
        this.doArtigo(this.estado.ocorrenciasPessoa, ocorrencia.artigoUrl).set(
            chaveOcorrencia(ocorrencia.inicio, ocorrencia.fim),
            { ...ocorrencia }
        );
    }

    async registrarOcorrenciaCidade(ocorrencia: OcorrenciaCidade): Promise<void> {
        this.doArtigo(this.estado.ocorrenciasCidade, ocorrencia.artigoUrl).set(
            chaveOcorrencia(ocorrencia.inicio, ocorrencia.fim),
            { ...ocorrencia, candidatos: ocorrencia.candidatos.map((candidato) => ({ ...candidato })) }
        );
    }

    async registrarCidadesArtigo(url: string, resumo: ResumoCidadesArtigo): Promise<void> {
        this.estado.cidadesArtigo.set(url, structuredClone(resumo));
    }

    async removerOcorrenciasObsoletas(url: string, versaoNer: string, versaoGazetteer: string): Promise<number> {
        let removidas = 0;

        const cidades = this.estado.ocorrenciasCidade.get(url);
        for (const [chave, ocorrencia] of cidades ?? []) {
            if (ocorrencia.versaoNer !== versaoNer || ocorrencia.versaoGazetteer !== versaoGazetteer) {
                cidades?.delete(chave);
                removidas += 1;
            }
        }

        // Ocorrências de pessoas não guardam versão: o artigo regrava todas
        this.estado.ocorrenciasPessoa.delete(url);

        return removidas;
    }

    /**
     * Executa `fn` sobre uma cópia do estado; a cópia só substitui o estado
     * atual se `fn` terminar sem erro. Transações rodam uma de cada vez:
     * a próxima só copia o estado depois que a anterior confirmou ou falhou.
     */
    async transacao<T>(fn: (gravador: GravadorResultados) => Promise<T>): Promise<T> {
        const anterior = this.filaTransacoes;
        let liberar = (): void => {};
        this.filaTransacoes = new Promise<void>((resolve) => {
            liberar = resolve;
        });

        await anterior;
        try {
            const rascunho = new ArmazemResultadosMemoria();
            rascunho.estado = structuredClone(this.estado);

            const resultado = await fn(rascunho);
            this.estado = rascunho.estado;
            return resultado;
        } finally {
            liberar();
        }
    }

    resultados(url: string): ResultadosArtigo | null {
        const cidades = this.estado.ocorrenciasCidade.get(url);
        const pessoas = this.estado.ocorrenciasPessoa.get(url);
        const resumo = this.estado.cidadesArtigo.get(url) ?? null;

        if (!cidades && !pessoas && !resumo) return null;

        return {
            url,
            pessoas: ordenarPorOffset(pessoas?.values() ?? []),
            cidades: ordenarPorOffset(cidades?.values() ?? []),
            resumo,
        };
    }

    // URLs com resultados gravados, na ordem de gravação
    artigos(): string[] {
        return [
            ...new Set([
                ...this.estado.ocorrenciasCidade.keys(),
                ...this.estado.ocorrenciasPessoa.keys(),
                ...this.estado.cidadesArtigo.keys(),
            ]),
        ];
    }

    pessoa(nomeCanonico: string): { id: string; aliases: string[] } | null {
        const registro = this.estado.pessoas.get(nomeCanonico);
        return registro ? { id: registro.id, aliases: [...registro.aliases].sort() } : null;
    }

    private doArtigo<T>(mapa: Map<string, Map<string, T>>, url: string): Map<string, T> {
        let doArtigo = mapa.get(url);
        if (!doArtigo) {
            doArtigo = new Map();
            mapa.set(url, doArtigo);
        }
        return doArtigo;
    }
}
