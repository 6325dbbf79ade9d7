/**
 * Composição das dependências a partir do ambiente.
 *
 * `montarContainer` recebe tudo pronto (usado nos testes e por criarContainer);
 * `criarContainer` lê o env, carrega o catálogo e escolhe os backends.
 */

import { clienteSql, encerrarPool, obterPool } from "./config/database.js";
import { env } from "./config/env.js";
import { ArmazemResultadosMemoria, RepositorioNoticiasMemoria } from "./database/memoria.repository.js";
import { GravadorResultadosPostgres, RepositorioNoticiasPostgres } from "./database/postgres.repository.js";
import { AnthropicNerService } from "./services/apis/anthropic-ner.service.js";
import { brasilApiService } from "./services/apis/brasilapi.service.js";
import { ibgeService } from "./services/apis/ibge.service.js";
import { cacheService } from "./services/cache.service.js";
import { CatalogoService } from "./services/catalogo.service.js";
import { ExtracaoService } from "./services/extracao.service.js";
import { Gazetteer } from "./services/gazetteer.service.js";
import { MotorNerGazetteer } from "./services/dicionario.service.js";
import { MotorNerVazio } from "./services/ner.service.js";
import { NormalizadorService, normalizadorService } from "./services/normalizador.service.js";
import { PadraoMencaoService } from "./services/padroes.service.js";
import { ResolucaoService } from "./services/resolucao.service.js";
import type { GravadorResultados, MotorNer, RepositorioNoticias } from "./types/contratos.js";
import type { MetadadosCatalogo } from "./types/index.js";

export interface Container {
    gazetteer: Gazetteer;
    metadadosCatalogo: MetadadosCatalogo | null;
    normalizador: NormalizadorService;
    resolucao: ResolucaoService;
    extracao: ExtracaoService;
    // Presentes apenas com os backends em memória (fila via HTTP e consulta de resultados)
    fila: RepositorioNoticiasMemoria | null;
    armazem: ArmazemResultadosMemoria | null;
    encerrar(): Promise<void>;
}

export interface DependenciasContainer {
    gazetteer: Gazetteer;
    metadadosCatalogo?: MetadadosCatalogo | null;
    normalizador?: NormalizadorService;
    repositorio?: RepositorioNoticias;
    gravador?: GravadorResultados;
    motorNer?: MotorNer;
    versaoNer?: string;
    versaoGazetteer?: string;
    tamanhoLote?: number;
    encerrar?: () => Promise<void>;
}

export function montarContainer(deps: DependenciasContainer): Container {
    const normalizador = deps.normalizador ?? normalizadorService;

    const fila = deps.repositorio ? null : new RepositorioNoticiasMemoria();
    const armazem = deps.gravador ? null : new ArmazemResultadosMemoria();
    const repositorio = deps.repositorio ?? fila ?? new RepositorioNoticiasMemoria();
    const gravador = deps.gravador ?? armazem ?? new ArmazemResultadosMemoria();

    const resolucao = new ResolucaoService({
        gazetteer: deps.gazetteer,
        normalizador,
        padroes: new PadraoMencaoService(normalizador),
        versaoNer: deps.versaoNer ?? "dev",
        versaoGazetteer: deps.versaoGazetteer,
    });

    const extracao = new ExtracaoService({
        repositorio,
        gravador,
        motorNer: deps.motorNer ?? new MotorNerGazetteer(deps.gazetteer, normalizador),
        resolucao,
        normalizador,
        tamanhoLote: deps.tamanhoLote,
    });

    return {
        gazetteer: deps.gazetteer,
        metadadosCatalogo: deps.metadadosCatalogo ?? null,
        normalizador,
        resolucao,
        extracao,
        fila,
        armazem,
        encerrar: deps.encerrar ?? (async () => {}),
    };
}

export function criarCatalogoService(): CatalogoService {
    return new CatalogoService([ibgeService, brasilApiService], {
        diretorio: env.CATALOGO_DIR,
        versao: env.CATALOGO_VERSAO,
        fontePrimaria: env.CATALOGO_FONTE_PRIMARIA,
        minimoRegistros: env.CATALOGO_MINIMO_REGISTROS,
        timeoutMs: env.PROVEDOR_TIMEOUT_MS,
    });
}

function criarMotorNer(gazetteer: Gazetteer, normalizador: NormalizadorService): MotorNer {
    switch (env.EXTRACAO_NER) {
        case "anthropic":
            return new AnthropicNerService(env.ANTHROPIC_API_KEY);
        case "nenhum":
            return new MotorNerVazio();
        default:
            return new MotorNerGazetteer(gazetteer, normalizador);
    }
}

export async function criarContainer(): Promise<Container> {
    const normalizador = new NormalizadorService(env.BOILERPLATE_PADROES.map((padrao) => new RegExp(padrao, "i")));

    const { metadata, records } = await criarCatalogoService().carregar();
    const gazetteer = new Gazetteer(records, metadata.version, normalizador);
    console.log(`[Container] Gazetteer ${metadata.version} carregado com ${gazetteer.total} municípios`);

    const sql =
        env.EXTRACAO_BACKEND_NOTICIAS === "postgres" || env.EXTRACAO_BACKEND_RESULTADOS === "postgres"
            ? clienteSql(obterPool())
            : null;

    return montarContainer({
        gazetteer,
        metadadosCatalogo: metadata,
        normalizador,
        repositorio: sql && env.EXTRACAO_BACKEND_NOTICIAS === "postgres" ? new RepositorioNoticiasPostgres(sql) : undefined,
        gravador:
            sql && env.EXTRACAO_BACKEND_RESULTADOS === "postgres" ? new GravadorResultadosPostgres(sql, sql) : undefined,
        motorNer: criarMotorNer(gazetteer, normalizador),
        versaoNer: env.NER_VERSION,
        versaoGazetteer: env.GAZETTEER_VERSION,
        tamanhoLote: env.EXTRACAO_TAMANHO_LOTE,
        encerrar: async () => {
            await encerrarPool();
            await cacheService.desconectar();
        },
    });
}
