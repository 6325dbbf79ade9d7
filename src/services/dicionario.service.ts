/**
 * DicionarioCidades — Busca dos nomes do catálogo direto no texto.
 *
 * Todos os nomes e nomes alternativos do gazetteer viram palavras-chave de um
 * autômato Aho-Corasick montado sobre o texto dobrado (minúsculo, sem acento,
 * hífen como espaço). Uma busca percorre o texto uma vez, qualquer que seja o
 * tamanho do catálogo. Os trechos voltam com offsets do texto original.
 */

import type { MotorNer } from "../types/contratos.js";
import { RotuloEntidade, type TrechoEntidade } from "../types/index.js";
import type { Gazetteer } from "./gazetteer.service.js";
import { normalizadorService, type NormalizadorService, type TextoComOffsets } from "./normalizador.service.js";

export const METODO_AUTOMATO = "automaton";
const CONFIANCA_AUTOMATO = 1;

// Mesma troca de apóstrofos do gazetteer; não altera o tamanho do texto
const REGEX_APOSTROFOS = /[\u2018\u2019\u02BC`\u00B4]/g;
const REGEX_CARACTERE_PALAVRA = /[a-z0-9]/;
const REGEX_INICIAL_MAIUSCULA = /^\p{Lu}/u;

interface NoAutomato {
    filhos: Map<string, NoAutomato>;
    falha: NoAutomato | null;
    // Tamanhos (no texto dobrado) das chaves reconhecidas ao chegar neste nó
    saidas: number[];
}

function criarNo(): NoAutomato {
    return { filhos: new Map(), falha: null, saidas: [] };
}

function ehCaracterePalavra(caractere: string): boolean {
    return caractere !== "" && REGEX_CARACTERE_PALAVRA.test(caractere);
}

// Unidades UTF-16 do caractere que começa em `indice`
function tamanhoCaractere(texto: string, indice: number): number {
    return (texto.codePointAt(indice) ?? 0) > 0xffff ? 2 : 1;
}

export interface TrechoDicionario {
    texto: string;
    inicio: number;
    fim: number;
}

export class DicionarioCidades {
    private readonly raiz = criarNo();
    private readonly totalChaves: number;

    constructor(
        gazetteer: Gazetteer,
        private readonly normalizador: NormalizadorService = normalizadorService
    ) {
        const chaves = new Set<string>();
        for (const registro of gazetteer.registros()) {
            for (const nome of [registro.name, ...(registro.alt_names ?? [])]) {
                const chave = this.dobrar(nome).texto.replace(/\s+/g, " ").trim();
                if (chave) chaves.add(chave);
            }
        }

        for (const chave of chaves) this.inserir(chave);
        this.ligarFalhas();
        this.totalChaves = chaves.size;
    }

    get total(): number {
        return this.totalChaves;
    }

    /**
     * Todas as ocorrências de nomes do catálogo com fronteira de palavra nos
     * dois lados, ordenadas por início (as mais longas antes). Trechos
     * sobrepostos ("São José" dentro de "São José dos Campos") são todos
     * devolvidos; a escolha fica com a resolução.
     */
    buscar(texto: string): TrechoDicionario[] {
        const { texto: dobrado, offsets } = this.dobrar(texto);
        const trechos: TrechoDicionario[] = [];

        let no = this.raiz;
        for (let indice = 0; indice < dobrado.length; indice++) {
            const caractere = dobrado.charAt(indice);

            let atual: NoAutomato | null = no;
            while (atual && !atual.filhos.has(caractere)) atual = atual.falha;
            no = atual?.filhos.get(caractere) ?? this.raiz;

            for (const tamanho of no.saidas) {
                const inicioDobrado = indice - tamanho + 1;
                const fimDobrado = indice + 1;
                if (ehCaracterePalavra(dobrado.charAt(inicioDobrado - 1))) continue;
                if (ehCaracterePalavra(dobrado.charAt(fimDobrado))) continue;

                const inicio = offsets[inicioDobrado];
                const ultimo = offsets[fimDobrado - 1];
                if (inicio === undefined || ultimo === undefined) continue;

                const fim = ultimo + tamanhoCaractere(texto, ultimo);
                trechos.push({ texto: texto.slice(inicio, fim), inicio, fim });
            }
        }

        return trechos.sort((a, b) => a.inicio - b.inicio || b.fim - a.fim);
    }

    private dobrar(texto: string): TextoComOffsets {
        return this.normalizador.normalizarComOffsets(texto.replace(REGEX_APOSTROFOS, "'"));
    }

    private inserir(chave: string): void {
        let no = this.raiz;
        for (const caractere of chave) {
            // Chaves são percorridas por unidade UTF-16, como o texto em buscar()
            for (let i = 0; i < caractere.length; i++) {
                const unidade = caractere.charAt(i);
                let filho = no.filhos.get(unidade);
                if (!filho) {
                    filho = criarNo();
                    no.filhos.set(unidade, filho);
                }
                no = filho;
            }
        }
        no.saidas.push(chave.length);
    }

    // Ligações de falha em largura; cada nó herda as saídas do seu nó de falha
    private ligarFalhas(): void {
        const fila: NoAutomato[] = [];
        for (const filho of this.raiz.filhos.values()) {
            filho.falha = this.raiz;
            fila.push(filho);
        }

        for (let cabeca = 0; cabeca < fila.length; cabeca++) {
            const no = fila[cabeca];
            if (!no) continue;

            for (const [caractere, filho] of no.filhos) {
                fila.push(filho);

                let falha = no.falha;
                while (falha && !falha.filhos.has(caractere)) falha = falha.falha;
                const destino = falha?.filhos.get(caractere) ?? this.raiz;
                filho.falha = destino;
                filho.saidas.push(...destino.saidas);
            }
        }
    }
}

/**
 * Motor de NER determinístico: cada nome do catálogo encontrado no texto vira
 * um trecho LOCATION. Só aceita ocorrências com inicial maiúscula, para não
 * confundir municípios com palavras comuns ("bonito", "alegre").
 */
export class MotorNerGazetteer implements MotorNer {
    readonly nome = "gazetteer";
    private readonly dicionario: DicionarioCidades;

    constructor(gazetteer: Gazetteer, normalizador: NormalizadorService = normalizadorService) {
        this.dicionario = new DicionarioCidades(gazetteer, normalizador);
    }

    async analisar(texto: string): Promise<TrechoEntidade[]> {
        return this.dicionario
            .buscar(texto)
            .filter((trecho) => REGEX_INICIAL_MAIUSCULA.test(trecho.texto))
            .map((trecho) => ({
                ...trecho,
                rotulo: RotuloEntidade.Local,
                confianca: CONFIANCA_AUTOMATO,
                metodo: METODO_AUTOMATO,
            }));
    }
}
