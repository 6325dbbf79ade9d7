// Portas consumidas pelo pipeline: catálogo, notícias, resultados e NER.
// Os adaptadores ficam em src/database e src/services/apis.

import type {
    FonteCatalogo,
    NoticiaPendente,
    OcorrenciaCidade,
    OcorrenciaPessoa,
    RegistroCidade,
    ResumoCidadesArtigo,
    TrechoEntidade,
} from "./index.js";

export interface OpcoesProvedor {
    timeoutMs: number;
    // Ignora o cache Redis e força novo download
    refresh: boolean;
}

// Fonte de dados de municípios (IBGE, BrasilAPI)
export interface ProvedorMunicipios {
    readonly fonte: FonteCatalogo;
    listarMunicipios(opcoes: OpcoesProvedor): Promise<RegistroCidade[]>;
}

// Notícias aguardando extração
export interface RepositorioNoticias {
    // Notícias nunca processadas ou processadas com outra versão de NER/gazetteer
    buscarPendentes(tamanho: number, versaoNer: string, versaoGazetteer: string): Promise<NoticiaPendente[]>;
    marcarProcessada(url: string, versaoNer: string, versaoGazetteer: string, em: Date): Promise<void>;
    marcarErro(url: string, mensagem: string): Promise<void>;
}

// Destino dos resultados; ocorrências são únicas por (artigoUrl, inicio, fim)
export interface GravadorResultados {
    garantirPessoa(nomeCanonico: string, aliases: Iterable<string>): Promise<string>;
    registrarOcorrenciaPessoa(ocorrencia: OcorrenciaPessoa): Promise<void>;
    registrarOcorrenciaCidade(ocorrencia: OcorrenciaCidade): Promise<void>;
    registrarCidadesArtigo(url: string, resumo: ResumoCidadesArtigo): Promise<void>;
    // Apaga ocorrências do artigo gravadas com outras versões do pipeline
    removerOcorrenciasObsoletas(url: string, versaoNer: string, versaoGazetteer: string): Promise<number>;
    /**
     * Executa `fn` atomicamente: ou todas as gravações do artigo são
     * confirmadas, ou nenhuma.
     */
    transacao<T>(fn: (gravador: GravadorResultados) => Promise<T>): Promise<T>;
}

// Motor de reconhecimento de entidades (offsets relativos ao texto recebido)
export interface MotorNer {
    readonly nome: string;
    analisar(texto: string): Promise<TrechoEntidade[]>;
}
