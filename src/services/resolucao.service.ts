/**
 * ResolucaoService — Desambiguação de menções a cidades em um artigo.
 *
 * Cada trecho candidato passa por: detectado → desambiguando →
 * {resolved | ambiguous | foreign}. O serviço é puro e síncrono: não faz I/O,
 * a persistência fica a cargo da camada de lote (ExtracaoService).
 *
 * Pesos:
 * - UF explícita ("Campinas-SP") com um candidato: 0.9 (+0.05 na regra cidade-uf)
 * - um candidato restante após filtrar pelas UFs do contexto: 0.9
 * - nome único no país sem UF de apoio: 0.8 (0.4 para nomes que também são palavras comuns)
 * - ambígua: 0.9 dividido pelo número de candidatos
 * - estrangeira: 0
 */

import { ErroOffsetTrecho } from "../types/erros.js";
import {
    RegraPadrao,
    RotuloEntidade,
    StatusResolucao,
    type ArtigoTexto,
    type CandidatoCidade,
    type OcorrenciaCidade,
    type RegistroCidade,
    type TrechoCandidato,
    type TrechoEntidade,
} from "../types/index.js";
import { SIGLAS_UF } from "../types/ufs.js";
import type { Gazetteer } from "./gazetteer.service.js";
import { normalizadorService, type NormalizadorService } from "./normalizador.service.js";
import { padraoMencaoService, selecionarSemSobreposicao, type PadraoMencaoService } from "./padroes.service.js";

const CONFIANCA_BASE = 0.9;
const BONUS_CIDADE_UF = 0.05;
const CONFIANCA_NACIONAL = 0.8;
const CONFIANCA_PALAVRA_COMUM = 0.4;

// Nomes de município que também são palavras comuns: exigem UF de apoio
const NOMES_PALAVRA_COMUM = new Set(["natal", "esperanca", "palmas"]);

// "Nome-UF" ou "Nome/UF" na superfície de um trecho
const REGEX_SUFIXO_UF = /^(.+?)[^\S\n]*[-/\u2010-\u2015][^\S\n]*(\p{L}{2})$/u;

const CONECTORES = new Set(["de", "do", "da", "dos", "das"]);

export interface OpcoesResolucao {
    gazetteer: Gazetteer;
    normalizador?: NormalizadorService;
    padroes?: PadraoMencaoService;
    versaoNer: string;
    // Padrão: versão do catálogo carregado no gazetteer
    versaoGazetteer?: string;
}

interface TrechoPosicionado {
    inicio: number;
    fim: number;
    candidato: TrechoCandidato;
}

interface NomeComUf {
    nome: string;
    uf: string | null;
}

interface Desambiguacao {
    status: StatusResolucao;
    cidade: RegistroCidade | null;
    candidatos: CandidatoCidade[];
    confianca: number;
}

function arredondar(valor: number): number {
    return Math.round(valor * 10000) / 10000;
}

function comUf(candidato: TrechoCandidato): boolean {
    return candidato.origem === "padrao" && candidato.trecho.uf !== null;
}

// Padrão com UF vence qualquer trecho; depois o mais longo, padrão antes de NER, o que começa antes
function compararCandidatos(a: TrechoPosicionado, b: TrechoPosicionado): number {
    const uf = Number(comUf(b.candidato)) - Number(comUf(a.candidato));
    if (uf !== 0) return uf;
    const tamanho = b.fim - b.inicio - (a.fim - a.inicio);
    if (tamanho !== 0) return tamanho;
    const padrao = Number(b.candidato.origem === "padrao") - Number(a.candidato.origem === "padrao");
    if (padrao !== 0) return padrao;
    return a.inicio - b.inicio;
}

export class ResolucaoService {
    private readonly gazetteer: Gazetteer;
    private readonly normalizador: NormalizadorService;
    private readonly padroes: PadraoMencaoService;
    readonly versaoNer: string;
    readonly versaoGazetteer: string;

    constructor(opcoes: OpcoesResolucao) {
        this.gazetteer = opcoes.gazetteer;
        this.normalizador = opcoes.normalizador ?? normalizadorService;
        this.padroes = opcoes.padroes ?? padraoMencaoService;
        this.versaoNer = opcoes.versaoNer;
        this.versaoGazetteer = opcoes.versaoGazetteer ?? opcoes.gazetteer.versao;
    }

    /**
     * Resolve as menções a cidades de um artigo.
     *
     * @param artigo - URL e texto já limpo (os offsets dos trechos apontam para ele)
     * @param trechosNer - Entidades do motor de NER; só LOCATION é considerado
     */
    resolver(artigo: ArtigoTexto, trechosNer: TrechoEntidade[]): OcorrenciaCidade[] {
        const { texto } = artigo;
        const ufsDocumento = this.normalizador.detectarUfs(texto);

        const posicionados: TrechoPosicionado[] = [];

        for (const trecho of trechosNer) {
            if (trecho.rotulo !== RotuloEntidade.Local) continue;
            if (!this.trechoValido(artigo, trecho)) continue;
            posicionados.push({ inicio: trecho.inicio, fim: trecho.fim, candidato: { origem: "ner", trecho } });
        }

        for (const trecho of this.padroes.encontrar(texto)) {
            posicionados.push({ inicio: trecho.inicio, fim: trecho.fim, candidato: { origem: "padrao", trecho } });
        }

        return selecionarSemSobreposicao(posicionados, compararCandidatos).map(({ candidato }) =>
            this.resolverTrecho(artigo, candidato, ufsDocumento)
        );
    }

    private trechoValido(artigo: ArtigoTexto, trecho: TrechoEntidade): boolean {
        const { inicio, fim } = trecho;
        const tamanho = artigo.texto.length;

        if (!Number.isInteger(inicio) || !Number.isInteger(fim) || inicio < 0 || inicio >= fim || fim > tamanho) {
            const erro = new ErroOffsetTrecho(inicio, fim, tamanho);
            console.warn(`[ResolucaoService] ${erro.message} em ${artigo.url}, trecho descartado`);
            return false;
        }

        if (artigo.texto.slice(inicio, fim) !== trecho.texto) {
            console.warn(
                `[ResolucaoService] Superfície "${trecho.texto}" não confere com o texto em [${inicio}, ${fim}) de ${artigo.url}, trecho descartado`
            );
            return false;
        }

        return true;
    }

    private resolverTrecho(
        artigo: ArtigoTexto,
        candidato: TrechoCandidato,
        ufsDocumento: Set<string>
    ): OcorrenciaCidade {
        const { trecho } = candidato;
        const { nome, uf } = this.separarUf(candidato);

        let inicio = trecho.inicio;
        let fim = trecho.fim;
        let nomeBusca = nome;

        // Padrões podem capturar palavras capitalizadas vizinhas ("Ontem Campinas-SP")
        if (candidato.origem === "padrao" && this.gazetteer.buscar(nome).length === 0) {
            const ajuste = this.ajustarNome(nome, candidato.trecho.regra);
            if (ajuste) {
                nomeBusca = ajuste.nome;
                inicio = trecho.inicio + ajuste.deslocamentoInicio;
                if (candidato.trecho.regra !== RegraPadrao.CidadeUf) {
                    fim = trecho.inicio + ajuste.deslocamentoInicio + ajuste.nome.length;
                }
            }
        }

        const frase = this.normalizador.extrairFrase(artigo.texto, inicio, fim);
        const ufsFrase = this.normalizador.detectarUfs(frase);
        const contexto = ufsFrase.size > 0 ? ufsFrase : ufsDocumento;

        const resultado = this.desambiguar(nomeBusca, uf, contexto, trecho.metodo === RegraPadrao.CidadeUf);

        return {
            artigoUrl: artigo.url,
            superficie: artigo.texto.slice(inicio, fim),
            inicio,
            fim,
            ufHint: uf,
            status: resultado.status,
            cidadeId: resultado.cidade?.ibge_id ?? null,
            candidatos: resultado.candidatos,
            confianca: resultado.confianca,
            frase,
            metodo: trecho.metodo,
            versaoNer: this.versaoNer,
            versaoGazetteer: this.versaoGazetteer,
        };
    }

    private desambiguar(
        nome: string,
        ufExplicita: string | null,
        contexto: Set<string>,
        regraCidadeUf: boolean
    ): Desambiguacao {
        const todos = this.gazetteer.buscar(nome);

        if (todos.length === 0) {
            return { status: StatusResolucao.Estrangeira, cidade: null, candidatos: [], confianca: 0 };
        }

        if (ufExplicita) {
            const naUf = todos.filter((registro) => registro.uf === ufExplicita);
            if (naUf.length === 1) {
                return this.resolvida(naUf[0], CONFIANCA_BASE + (regraCidadeUf ? BONUS_CIDADE_UF : 0));
            }
            if (naUf.length > 1) return this.ambigua(naUf);
            // UF explícita sem candidato: a dica pode estar errada, segue pelo contexto
        }

        const noContexto = todos.filter((registro) => contexto.has(registro.uf));

        if (todos.length === 1) {
            const [unico] = todos;
            if (noContexto.length === 1) return this.resolvida(unico, CONFIANCA_BASE);
            const palavraComum = NOMES_PALAVRA_COMUM.has(this.normalizador.normalizar(nome));
            return this.resolvida(unico, palavraComum ? CONFIANCA_PALAVRA_COMUM : CONFIANCA_NACIONAL);
        }

        if (noContexto.length === 1) return this.resolvida(noContexto[0], CONFIANCA_BASE);
        if (noContexto.length > 1) return this.ambigua(noContexto);
        return this.ambigua(todos);
    }

    private resolvida(cidade: RegistroCidade, confianca: number): Desambiguacao {
        const valor = arredondar(confianca);
        return {
            status: StatusResolucao.Resolvida,
            cidade,
            candidatos: [{ cidadeId: cidade.ibge_id, nome: cidade.name, uf: cidade.uf, score: valor }],
            confianca: valor,
        };
    }

    private ambigua(registros: RegistroCidade[]): Desambiguacao {
        const valor = arredondar(CONFIANCA_BASE / registros.length);
        return {
            status: StatusResolucao.Ambigua,
            cidade: null,
            candidatos: registros.map((registro) => ({
                cidadeId: registro.ibge_id,
                nome: registro.name,
                uf: registro.uf,
                score: valor,
            })),
            confianca: valor,
        };
    }

    // Separa o nome da UF explícita (do padrão ou da superfície "Nome-UF" do NER)
    private separarUf(candidato: TrechoCandidato): NomeComUf {
        const superficie = candidato.trecho.texto.trim();
        const match = REGEX_SUFIXO_UF.exec(superficie);
        const sigla = match ? match[2].toUpperCase() : null;

        if (match && sigla && SIGLAS_UF.has(sigla)) {
            return { nome: match[1], uf: sigla };
        }

        if (candidato.origem === "padrao" && candidato.trecho.uf) {
            return { nome: superficie, uf: candidato.trecho.uf };
        }

        return { nome: superficie, uf: null };
    }

    /**
     * Tenta encurtar o nome capturado por um padrão até achar um município:
     * na regra cidade-uf descarta palavras do início, nas de gatilho descarta do fim.
     */
    private ajustarNome(
        nome: string,
        regra: RegraPadrao
    ): { nome: string; deslocamentoInicio: number } | null {
        const palavras = [...nome.matchAll(/\S+/g)].map((match) => ({
            texto: match[0],
            inicio: match.index ?? 0,
            fim: (match.index ?? 0) + match[0].length,
        }));
        if (palavras.length < 2) return null;

        const variantes: Array<{ nome: string; deslocamentoInicio: number }> = [];

        if (regra === RegraPadrao.CidadeUf) {
            for (const palavra of palavras.slice(1)) {
                if (CONECTORES.has(palavra.texto)) continue;
                variantes.push({ nome: nome.slice(palavra.inicio), deslocamentoInicio: palavra.inicio });
            }
        } else {
            for (const palavra of palavras.slice(0, -1).reverse()) {
                if (CONECTORES.has(palavra.texto)) continue;
                variantes.push({ nome: nome.slice(0, palavra.fim), deslocamentoInicio: 0 });
            }
        }

        return variantes.find((variante) => this.gazetteer.buscar(variante.nome).length > 0) ?? null;
    }
}
