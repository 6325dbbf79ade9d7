// Status terminal de uma menção a cidade após a desambiguação
export enum StatusResolucao {
    Resolvida = "resolved",
    Ambigua = "ambiguous",
    Estrangeira = "foreign",
}

// Rótulos de entidade aceitos pelo pipeline (NER ou regras)
export enum RotuloEntidade {
    Pessoa = "PERSON",
    Local = "LOCATION",
}

// Provedores de dados de municípios usados pelo construtor do catálogo
export enum FonteCatalogo {
    Ibge = "ibge",
    BrasilApi = "brasilapi",
}

// Regras determinísticas do reconhecedor de padrões
export enum RegraPadrao {
    CidadeUf = "cidade-uf",
    PrefeitoDe = "prefeito-de",
    MunicipioDe = "municipio-de",
}

// Labels para exibição (relatórios e CLI)
export const STATUS_RESOLUCAO_LABEL: Record<StatusResolucao, string> = {
    [StatusResolucao.Resolvida]: "Resolvida",
    [StatusResolucao.Ambigua]: "Ambígua",
    [StatusResolucao.Estrangeira]: "Estrangeira",
};

// Entrada do catálogo versionado (chaves em snake_case, iguais às do arquivo)
export interface RegistroCidade {
    ibge_id: string;
    name: string;
    uf: string;
    state: string;
    region: string;
    alt_names?: string[];
    latitude?: number | null;
    longitude?: number | null;
    capital?: boolean;
    siafi_id?: string | null;
    ddd?: string | null;
    timezone?: string | null;
    mesoregion?: string | null;
    microregion?: string | null;
}

// Metadados gravados junto com os registros do catálogo
export interface MetadadosCatalogo {
    version: string;
    source: FonteCatalogo;
    primary_source: FonteCatalogo;
    downloaded_at: string;
    record_count: number;
    checksum: string;
}

// Conteúdo completo do arquivo de catálogo
export interface ArquivoCatalogo {
    metadata: MetadadosCatalogo;
    records: RegistroCidade[];
}

// Menção detectada no texto (pelo NER ou por um padrão)
export interface TrechoEntidade {
    texto: string;
    rotulo: RotuloEntidade;
    inicio: number;
    fim: number;
    confianca: number; // 0 a 1
    metodo: string; // "ner" ou nome da regra
}

// Trecho produzido pelo reconhecedor de padrões (UF presente apenas na regra cidade-uf)
export interface TrechoPadrao extends TrechoEntidade {
    regra: RegraPadrao;
    uf: string | null;
}

// Variante etiquetada consumida pelo motor de resolução
export type TrechoCandidato =
    | { origem: "ner"; trecho: TrechoEntidade }
    | { origem: "padrao"; trecho: TrechoPadrao };

// Candidato retornado pelo gazetteer com o peso atribuído na desambiguação
export interface CandidatoCidade {
    cidadeId: string;
    nome: string;
    uf: string;
    score: number;
}

// Resultado da resolução de um trecho em um artigo
export interface OcorrenciaCidade {
    artigoUrl: string;
    superficie: string;
    inicio: number;
    fim: number;
    ufHint: string | null;
    status: StatusResolucao;
    cidadeId: string | null;
    candidatos: CandidatoCidade[];
    confianca: number;
    frase: string;
    metodo: string;
    versaoNer: string;
    versaoGazetteer: string;
}

// Nome de pessoa já canonizado (chave de upsert)
export interface NomePessoaNormalizado {
    nomeCanonico: string;
    aliases: Set<string>;
}

// Ocorrência de pessoa em um artigo (canal lateral do pipeline)
export interface OcorrenciaPessoa {
    artigoUrl: string;
    pessoaId: string;
    nomeCanonico: string;
    superficie: string;
    inicio: number;
    fim: number;
    frase: string;
    metodo: string;
    confianca: number;
}

// Pessoa detectada no artigo, antes de receber id do gravador
export type PessoaDetectada = Omit<OcorrenciaPessoa, "pessoaId"> & { aliases: string[] };

// Notícia aguardando extração, entregue pelo repositório
export interface NoticiaPendente {
    url: string;
    titulo: string;
    corpo: string;
    publicadaEm: Date;
    fonte?: string | null;
    versaoNer?: string | null;
    versaoGazetteer?: string | null;
}

// Texto já limpo que o motor de resolução analisa (título + corpo)
export interface ArtigoTexto {
    url: string;
    texto: string;
}

// Cidade consolidada no nível do artigo
export interface CidadeMencionada {
    cidadeId: string;
    nome: string;
    uf: string;
    ocorrencias: number;
    confianca: number;
    metodos: string[];
}

// Resumo das cidades de um artigo (lista + cidade principal)
export interface ResumoCidadesArtigo {
    principal: CidadeMencionada | null;
    cidades: CidadeMencionada[];
}

// Resultado completo do processamento de um artigo
export interface ResultadoArtigo {
    url: string;
    pessoas: PessoaDetectada[];
    cidades: OcorrenciaCidade[];
    resumo: ResumoCidadesArtigo;
}

// Métricas agregadas de um lote
export interface ResumoLote {
    processadas: number;
    vazias: number;
    atualizadas: number;
    resolvidas: number;
    ambiguas: number;
    estrangeiras: number;
    erros: Array<{ url: string; mensagem: string }>;
    dryRun: boolean;
    // Preenchido apenas em dry-run: ocorrências que seriam gravadas
    previa: ResultadoArtigo[];
}
