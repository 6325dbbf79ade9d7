/**
 * Erros de domínio do pipeline de resolução de cidades.
 *
 * Ambiguidade não é erro: aparece como status "ambiguous" na ocorrência.
 */

import type { FonteCatalogo } from "./index.js";

// Falha ao obter dados de um provedor de municípios (dispara o fallback)
export class ErroProvedor extends Error {
    readonly fonte: FonteCatalogo | null;

    constructor(mensagem: string, fonte: FonteCatalogo | null = null, options?: ErrorOptions) {
        super(mensagem, options);
        this.name = "ErroProvedor";
        this.fonte = fonte;
    }
}

// Catálogo truncado ou com checksum divergente: nunca é publicado nem carregado
export class ErroIntegridadeCatalogo extends Error {
    constructor(mensagem: string) {
        super(mensagem);
        this.name = "ErroIntegridadeCatalogo";
    }
}

// Falha ao processar um único artigo; o lote continua
export class ErroProcessamentoArtigo extends Error {
    readonly url: string;

    constructor(url: string, causa: unknown) {
        const detalhe = causa instanceof Error ? causa.message : String(causa);
        super(`Falha ao processar notícia ${url}: ${detalhe}`, { cause: causa });
        this.name = "ErroProcessamentoArtigo";
        this.url = url;
    }
}

// Offsets inválidos vindos do motor de NER (o trecho é descartado com aviso)
export class ErroOffsetTrecho extends Error {
    readonly inicio: number;
    readonly fim: number;

    constructor(inicio: number, fim: number, tamanhoTexto: number) {
        super(`Trecho com offsets inválidos [${inicio}, ${fim}) para texto de ${tamanhoTexto} caracteres`);
        this.name = "ErroOffsetTrecho";
        this.inicio = inicio;
        this.fim = fim;
    }
}
