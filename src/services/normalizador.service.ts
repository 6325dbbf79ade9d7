/**
 * NormalizadorService — Normalização textual usada pelo pipeline de extração.
 *
 * Reúne a limpeza de nomes (acentos, caixa, espaços), a remoção de boilerplate
 * de notícias, a detecção de UFs mencionadas no texto, a extração da frase que
 * contém um trecho e a canonização de nomes de pessoas.
 */

import type { NomePessoaNormalizado } from "../types/index.js";
import { SIGLAS_UF, UFS } from "../types/ufs.js";

// Linhas de boilerplate recorrentes em portais (créditos, chamadas, rodapés)
const PADROES_BOILERPLATE: RegExp[] = [
    /^leia (também|tambem|ainda|mais)\b/i,
    /^(crédito|credito|reportagem|foto|fotos|edição|edicao)\s*:/i,
    /^(©|\(c\)|copyright\b)/i,
    /todos os direitos reservados/i,
];

// Títulos e cargos removidos antes de canonizar nomes de pessoas
const REGEX_TITULOS =
    /(?<!\p{L})(?:dra|dr|dep|sra|sr)\.?(?!\p{L})|(?<!\p{L})(?:deputad[oa]s?|ministr[oa]s?|presidente|governador[a]?|prefeit[oa]s?|vereador[a]?|senador[a]?)(?!\p{L})/giu;

// Variantes tipográficas de hífen
const REGEX_HIFENS = /[\u2010-\u2015]/g;
const HIFENS = new Set(["-", "\u2010", "\u2011", "\u2012", "\u2013", "\u2014", "\u2015"]);

// Conectores mantidos em minúsculo em nomes próprios
const CONECTORES = new Set(["da", "de", "do", "das", "dos", "e"]);

// Delimitadores de frase
const DELIMITADORES = new Set([".", "!", "?", "\n"]);

// Siglas que só contam em maiúsculo ("se" é pronome; "to", "go" e "am" aparecem em citações em inglês)
const SIGLAS_SOMENTE_MAIUSCULAS = new Set(["SE", "TO", "GO", "AM"]);

// Estados cujo nome sem acento colide com palavra comum ("Pará" × "para")
const ESTADOS_ACENTO_OBRIGATORIO = new Set(["PA"]);

// Palavras de duas letras candidatas a sigla
const REGEX_PALAVRA_DUAS_LETRAS = /(?<![\p{L}\p{N}])\p{L}{2}(?![\p{L}\p{N}])/gu;

// Remove diacríticos e converte para minúsculo
function dobrar(texto: string): string {
    return texto.normalize("NFD").replace(/[\u0300-\u036f]/g, "").toLowerCase();
}

// Regex dos nomes completos de estado (já dobrados), do maior para o menor
const ESTADOS_POR_NOME = new Map<string, string>();
for (const [sigla, { nome }] of Object.entries(UFS)) {
    if (ESTADOS_ACENTO_OBRIGATORIO.has(sigla)) continue;
    ESTADOS_POR_NOME.set(dobrar(nome), sigla);
}
const REGEX_NOMES_ESTADOS = new RegExp(
    `(?<![a-z0-9])(${[...ESTADOS_POR_NOME.keys()]
        .sort((a, b) => b.length - a.length)
        .map((nome) => nome.replace(/\s+/g, "\\s+"))
        .join("|")})(?![a-z0-9])`,
    "g"
);
const REGEX_NOMES_COM_ACENTO = [...ESTADOS_ACENTO_OBRIGATORIO].map((sigla) => ({
    sigla,
    regex: new RegExp(`(?<!\\p{L})${UFS[sigla]?.nome.toLowerCase() ?? sigla}(?!\\p{L})`, "u"),
}));

/** Texto dobrado com o índice original de cada caractere. */
export interface TextoComOffsets {
    texto: string;
    offsets: number[];
}

export class NormalizadorService {
    private readonly padroesBoilerplate: RegExp[];

    /**
     * @param padroesExtras - Regexes adicionais de boilerplate (ex: nome do portal no rodapé)
     */
    constructor(padroesExtras: RegExp[] = []) {
        this.padroesBoilerplate = [...PADROES_BOILERPLATE, ...padroesExtras];
    }

    /**
     * Normalização básica: converte para minúsculo, remove acentos/diacríticos,
     * colapsa espaços múltiplos e faz trim.
     * Usada como chave do gazetteer e em todas as comparações de nomes.
     */
    normalizar(nome: string): string {
        return (
            nome
                // Converte para minúsculo
                .toLowerCase()
                // Decompõe caracteres acentuados (NFD) e remove os diacríticos
                .normalize("NFD")
                .replace(/[\u0300-\u036f]/g, "")
                // Colapsa múltiplos espaços em um único
                .replace(/\s+/g, " ")
                // Remove espaços no início e fim
                .trim()
        );
    }

    /**
     * Limpa o texto de uma notícia: descarta linhas vazias e de boilerplate,
     * colapsa espaços dentro de cada linha e mantém as quebras entre linhas
     * (usadas como fronteira de frase).
     */
    normalizarTexto(texto: string): string {
        const linhas: string[] = [];

        for (const bruta of texto.split(/\r?\n/)) {
            const linha = bruta.replace(/\s+/g, " ").trim();
            if (!linha) continue;

            // Linha inteira de crédito, chamada ou rodapé é descartada
            if (this.padroesBoilerplate.some((padrao) => padrao.test(linha))) continue;

            linhas.push(linha);
        }

        return linhas.join("\n");
    }

    /**
     * Detecta as UFs mencionadas no texto, por sigla ou por nome completo.
     *
     * Siglas: palavra isolada de duas letras, sem diferenciar caixa (exceto
     * "SE", "TO", "GO" e "AM", só em maiúsculo).
     * Nomes: sem diferenciar caixa nem acento, respeitando limites de palavra
     * ("Pará" exige o acento).
     */
    detectarUfs(texto: string): Set<string> {
        const ufs = new Set<string>();

        for (const match of texto.matchAll(REGEX_PALAVRA_DUAS_LETRAS)) {
            const palavra = match[0];
            const sigla = palavra.toUpperCase();
            if (!SIGLAS_UF.has(sigla)) continue;
            if (SIGLAS_SOMENTE_MAIUSCULAS.has(sigla) && palavra !== sigla) continue;
            ufs.add(sigla);
        }

        const dobrado = this.normalizarComOffsets(texto).texto;
        for (const match of dobrado.matchAll(REGEX_NOMES_ESTADOS)) {
            const sigla = ESTADOS_POR_NOME.get(match[1].replace(/\s+/g, " "));
            if (sigla) ufs.add(sigla);
        }

        const minusculo = texto.normalize("NFC").toLowerCase();
        for (const { sigla, regex } of REGEX_NOMES_COM_ACENTO) {
            if (regex.test(minusculo)) ufs.add(sigla);
        }

        return ufs;
    }

    /**
     * Retorna a frase que contém o trecho [inicio, fim).
     * Offsets fora do texto são ajustados aos limites, sem lançar erro.
     */
    extrairFrase(texto: string, inicio: number, fim: number): string {
        const tamanho = texto.length;
        if (tamanho === 0) return "";

        const a = Math.min(Math.max(Math.min(inicio, fim), 0), tamanho);
        const b = Math.min(Math.max(Math.max(inicio, fim), 0), tamanho);

        // Volta até o delimitador anterior ao trecho
        let esquerda = a;
        while (esquerda > 0 && !DELIMITADORES.has(texto[esquerda - 1] ?? "")) {
            esquerda--;
        }

        // Avança até o próximo delimitador (a pontuação final entra na frase)
        let direita = b;
        const terminaEmDelimitador = b > a && DELIMITADORES.has(texto[b - 1] ?? "");
        if (!terminaEmDelimitador) {
            while (direita < tamanho && !DELIMITADORES.has(texto[direita] ?? "")) {
                direita++;
            }
            if (direita < tamanho && texto[direita] !== "\n") {
                direita++;
            }
        }

        return texto.slice(esquerda, direita).trim();
    }

    /**
     * Canoniza um nome de pessoa para uso como chave de upsert:
     * remove títulos/cargos, unifica hífens, capitaliza os tokens e mantém
     * conectores (da, de, do...) em minúsculo.
     */
    normalizarNomePessoa(superficie: string): NomePessoaNormalizado {
        const original = superficie.trim();

        let nome = original.replace(REGEX_HIFENS, "-").replace(/\u00AD/g, "");
        nome = nome.replace(REGEX_TITULOS, " ");
        // "ex-prefeito" vira "ex-" após remover o cargo
        nome = nome.replace(/^\s*ex[\s-]+/i, "");
        // Pontuação solta que sobra dos títulos abreviados ("Dr. ")
        nome = nome.replace(/^[^\p{L}]+/u, "");
        nome = nome.replace(/\s+/g, " ").trim();

        const nomeCanonico = nome
            .split(" ")
            .filter(Boolean)
            .map((token, indice) => this.capitalizarPalavra(token, indice === 0))
            .join(" ");

        const aliases = new Set<string>();
        if (nomeCanonico && nomeCanonico !== original) {
            aliases.add(original);
        }

        return { nomeCanonico, aliases };
    }

    /**
     * Versão dobrada do texto (minúsculo, sem acentos, hífens viram espaço)
     * com o mapa de cada caractere para o índice original.
     * Permite casar regras no texto dobrado e devolver offsets do texto original.
     */
    normalizarComOffsets(texto: string): TextoComOffsets {
        const caracteres: string[] = [];
        const offsets: number[] = [];

        let indice = 0;
        for (const caractere of texto) {
            if (HIFENS.has(caractere)) {
                caracteres.push(" ");
                offsets.push(indice);
            } else if (caractere !== "\u00AD") {
                // Um índice por unidade UTF-16 do texto dobrado
                const dobrado = dobrar(caractere);
                caracteres.push(dobrado);
                for (let i = 0; i < dobrado.length; i++) offsets.push(indice);
            }
            indice += caractere.length;
        }

        return { texto: caracteres.join(""), offsets };
    }

    private capitalizarPalavra(palavra: string, primeira: boolean): string {
        const minuscula = palavra.toLowerCase();

        if (!primeira && CONECTORES.has(minuscula)) {
            return minuscula;
        }

        // Siglas curtas em maiúsculo são preservadas (ex: "PT", "JR")
        if (
            palavra.length <= 3 &&
            palavra === palavra.toUpperCase() &&
            /\p{L}/u.test(palavra) &&
            !CONECTORES.has(minuscula)
        ) {
            return palavra;
        }

        return palavra
            .split("-")
            .map((parte, indice) => {
                const parteMinuscula = parte.toLowerCase();
                if (indice > 0 && CONECTORES.has(parteMinuscula)) return parteMinuscula;
                // Maiúscula no início e depois de apóstrofo ("D'Ávila")
                return parteMinuscula.replace(/(^|['\u2019])(\p{L})/gu, (_m, antes: string, letra: string) => antes + letra.toUpperCase());
            })
            .join("-");
    }
}

// Singleton com os padrões padrão de boilerplate
export const normalizadorService = new NormalizadorService();
