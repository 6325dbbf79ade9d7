/**
 * PadraoMencaoService — Regras determinísticas de menção a municípios.
 *
 * Regras:
 * - cidade-uf:    "Campinas-SP", "Campinas/SP" (UF entre as 27 siglas)
 * - prefeito-de:  "prefeito de Campinas", "prefeita da Serra"
 * - municipio-de: "município de Campinas"
 *
 * Os gatilhos ("prefeito de", "município de") casam no texto dobrado
 * (sem acento, minúsculo); o nome da cidade é lido no texto original a partir
 * do offset mapeado de volta, já que a capitalização é o que delimita o nome.
 */

import { RegraPadrao, RotuloEntidade, type TrechoPadrao } from "../types/index.js";
import { SIGLAS_UF } from "../types/ufs.js";
import { normalizadorService, type NormalizadorService } from "./normalizador.service.js";

// Espaço horizontal (o texto limpo usa \n como fronteira de frase)
const ESPACO = String.raw`[^\S\n]+`;
const HIFEN = String.raw`[-\u2010-\u2015]`;

// Palavra capitalizada; o hífen só continua o nome se não vier uma sigla de UF depois
const PALAVRA = String.raw`\p{Lu}[\p{L}\p{M}'\u2019]*(?:${HIFEN}(?!\p{L}{2}(?![\p{L}\p{M}]))\p{L}[\p{L}\p{M}'\u2019]*)*`;
const CONECTOR = String.raw`(?:${ESPACO}(?:de|do|da|dos|das)${ESPACO}|${ESPACO}d['\u2019]|${ESPACO})`;
const NOME_PROPRIO = `${PALAVRA}(?:${CONECTOR}${PALAVRA})*`;

const REGEX_CIDADE_UF = new RegExp(
    String.raw`(?<![\p{L}\p{N}'\u2019-])(${NOME_PROPRIO})[^\S\n]*(?:${HIFEN}|/)[^\S\n]*(\p{L}{2})(?![\p{L}\p{M}\p{N}])`,
    "gu"
);

// Sigla em maiúsculas no fim do nome: tag partidária ("PL-SP", "PSOL-RJ"), não cidade
const REGEX_SIGLA_FINAL = /(?:^|[^\S\n])\p{Lu}{1,4}$/u;

// Nome próprio ancorado no offset informado (flag sticky)
const REGEX_NOME_ANCORADO = new RegExp(NOME_PROPRIO, "uy");

// Gatilhos sobre o texto dobrado
const GATILHOS: Array<{ regra: RegraPadrao; regex: RegExp }> = [
    { regra: RegraPadrao.PrefeitoDe, regex: /(?<![a-z0-9])prefeit[oa]s?\s+(?:de|do|da)\s+/g },
    { regra: RegraPadrao.MunicipioDe, regex: /(?<![a-z0-9])municipio\s+(?:de|do|da)\s+/g },
];

// Confiança atribuída a cada regra (a UF explícita é o sinal mais forte)
const CONFIANCA_REGRA: Record<RegraPadrao, number> = {
    [RegraPadrao.CidadeUf]: 0.95,
    [RegraPadrao.PrefeitoDe]: 0.9,
    [RegraPadrao.MunicipioDe]: 0.9,
};

interface Intervalo {
    inicio: number;
    fim: number;
}

/**
 * Mantém apenas trechos sem sobreposição, escolhendo pela ordem de
 * `comparar` (o primeiro na ordem vence). Resultado ordenado por início.
 */
export function selecionarSemSobreposicao<T extends Intervalo>(
    trechos: T[],
    comparar: (a: T, b: T) => number
): T[] {
    const aceitos: T[] = [];

    for (const trecho of [...trechos].sort(comparar)) {
        const sobrepoe = aceitos.some((aceito) => trecho.inicio < aceito.fim && aceito.inicio < trecho.fim);
        if (!sobrepoe) aceitos.push(trecho);
    }

    return aceitos.sort((a, b) => a.inicio - b.inicio);
}

// Mais longo primeiro; empate: com UF primeiro, depois o que começa antes
function compararPadroes(a: TrechoPadrao, b: TrechoPadrao): number {
    const tamanho = b.fim - b.inicio - (a.fim - a.inicio);
    if (tamanho !== 0) return tamanho;
    const comUf = Number(b.uf !== null) - Number(a.uf !== null);
    if (comUf !== 0) return comUf;
    return a.inicio - b.inicio;
}

export class PadraoMencaoService {
    constructor(private readonly normalizador: NormalizadorService = normalizadorService) {}

    /**
     * Encontra menções a cidades pelas regras determinísticas.
     * Offsets apontam para o texto recebido.
     */
    encontrar(texto: string): TrechoPadrao[] {
        const trechos = [...this.encontrarCidadeUf(texto), ...this.encontrarPorGatilho(texto)];
        return selecionarSemSobreposicao(trechos, compararPadroes);
    }

    private encontrarCidadeUf(texto: string): TrechoPadrao[] {
        const trechos: TrechoPadrao[] = [];

        for (const match of texto.matchAll(REGEX_CIDADE_UF)) {
            const uf = match[2].toUpperCase();
            // Sigla fora das 27 UFs invalida o padrão
            if (!SIGLAS_UF.has(uf)) continue;
            if (REGEX_SIGLA_FINAL.test(match[1])) continue;

            const inicio = match.index ?? 0;
            const fim = inicio + match[0].length;
            trechos.push(this.criarTrecho(texto, inicio, fim, RegraPadrao.CidadeUf, uf));
        }

        return trechos;
    }

    private encontrarPorGatilho(texto: string): TrechoPadrao[] {
        const trechos: TrechoPadrao[] = [];
        const { texto: dobrado, offsets } = this.normalizador.normalizarComOffsets(texto);

        for (const { regra, regex } of GATILHOS) {
            for (const match of dobrado.matchAll(regex)) {
                const fimGatilho = (match.index ?? 0) + match[0].length;
                const inicioNome = offsets[fimGatilho] ?? texto.length;

                REGEX_NOME_ANCORADO.lastIndex = inicioNome;
                const nome = REGEX_NOME_ANCORADO.exec(texto);
                if (!nome) continue;

                trechos.push(this.criarTrecho(texto, inicioNome, inicioNome + nome[0].length, regra, null));
            }
        }

        return trechos;
    }

    private criarTrecho(
        texto: string,
        inicio: number,
        fim: number,
        regra: RegraPadrao,
        uf: string | null
    ): TrechoPadrao {
        return {
            texto: texto.slice(inicio, fim),
            rotulo: RotuloEntidade.Local,
            inicio,
            fim,
            confianca: CONFIANCA_REGRA[regra],
            metodo: regra,
            regra,
            uf,
        };
    }
}

export const padraoMencaoService = new PadraoMencaoService();
