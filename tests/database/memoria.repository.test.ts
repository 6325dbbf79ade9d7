import { afterEach, describe, it, expect, vi } from "vitest";
import { ArmazemResultadosMemoria, RepositorioNoticiasMemoria } from "../../src/database/memoria.repository.js";
import { ExtracaoService } from "../../src/services/extracao.service.js";
import { MotorNerVazio } from "../../src/services/ner.service.js";
import { ResolucaoService } from "../../src/services/resolucao.service.js";
import { StatusResolucao, type NoticiaPendente, type OcorrenciaCidade } from "../../src/types/index.js";
import { criarGazetteer } from "../helpers.js";

function noticia(url: string, dia: number): NoticiaPendente {
    return { url, titulo: `Título ${url}`, corpo: "", publicadaEm: new Date(Date.UTC(2026, 0, dia)) };
}

function ocorrenciaCidade(url: string, inicio: number, versaoNer = "ner-1"): OcorrenciaCidade {
    return {
        artigoUrl: url,
        superficie: "Campinas",
        inicio,
        fim: inicio + 8,
        ufHint: null,
        status: StatusResolucao.Resolvida,
        cidadeId: "3509502",
        candidatos: [{ cidadeId: "3509502", nome: "Campinas", uf: "SP", score: 0.8 }],
        confianca: 0.8,
        frase: "Chuva em Campinas",
        metodo: "ner",
        versaoNer,
        versaoGazetteer: "v1",
    };
}

describe("RepositorioNoticiasMemoria", () => {
    it("entrega pendentes por data de publicação e URL, limitado ao tamanho", async () => {
        const repositorio = new RepositorioNoticiasMemoria();
        repositorio.enfileirar([noticia("b", 2), noticia("c", 1), noticia("a", 2)]);

        const pendentes = await repositorio.buscarPendentes(2, "ner-1", "v1");
        expect(pendentes.map((item) => item.url)).toEqual(["c", "a"]);
        expect(pendentes[0]).toMatchObject({ versaoNer: null, versaoGazetteer: null });
    });

    it("tira da fila o que foi processado com as versões atuais", async () => {
        const repositorio = new RepositorioNoticiasMemoria();
        repositorio.enfileirar([noticia("a", 1), noticia("b", 2)]);
        const em = new Date("2026-01-05T10:00:00.000Z");

        await repositorio.marcarProcessada("a", "ner-1", "v1", em);

        expect((await repositorio.buscarPendentes(10, "ner-1", "v1")).map((item) => item.url)).toEqual(["b"]);
        expect((await repositorio.buscarPendentes(10, "ner-2", "v1")).map((item) => item.url)).toEqual(["a", "b"]);
        expect(repositorio.situacao("a")).toEqual({
            url: "a",
            titulo: "Título a",
            versaoNer: "ner-1",
            versaoGazetteer: "v1",
            processadaEm: em,
            erro: null,
        });
    });

    it("mantém na fila a notícia com erro e zera versões ao reenfileirar", async () => {
        const repositorio = new RepositorioNoticiasMemoria();
        repositorio.enfileirar([noticia("a", 1)]);

        await repositorio.marcarErro("a", "timeout");
        expect(repositorio.situacao("a")?.erro).toBe("timeout");
        expect(await repositorio.buscarPendentes(10, "ner-1", "v1")).toHaveLength(1);

        await repositorio.marcarProcessada("a", "ner-1", "v1", new Date());
        expect(repositorio.enfileirar([noticia("a", 1)])).toBe(1);
        expect(await repositorio.buscarPendentes(10, "ner-1", "v1")).toHaveLength(1);
        expect(repositorio.total).toBe(1);
        expect(repositorio.situacao("inexistente")).toBeNull();
    });
});

describe("ArmazemResultadosMemoria", () => {
    it("substitui a ocorrência com os mesmos offsets", async () => {
        const armazem = new ArmazemResultadosMemoria();
        await armazem.registrarOcorrenciaCidade(ocorrenciaCidade("a", 9));
        await armazem.registrarOcorrenciaCidade({ ...ocorrenciaCidade("a", 9), confianca: 0.9 });
        await armazem.registrarOcorrenciaCidade(ocorrenciaCidade("a", 0));

        const resultados = armazem.resultados("a");
        expect(resultados?.cidades.map((item) => [item.inicio, item.confianca])).toEqual([
            [0, 0.8],
            [9, 0.9],
        ]);
        expect(armazem.artigos()).toEqual(["a"]);
        expect(armazem.resultados("b")).toBeNull();
    });

    it("reaproveita o id da pessoa e acumula aliases", async () => {
        const armazem = new ArmazemResultadosMemoria();
        const id = await armazem.garantirPessoa("Marcos Ribeiro", ["prefeito Marcos Ribeiro"]);
        const mesmoId = await armazem.garantirPessoa("Marcos Ribeiro", ["Dr. Marcos Ribeiro"]);

        expect(mesmoId).toBe(id);
        expect(armazem.pessoa("Marcos Ribeiro")).toEqual({
            id,
            aliases: ["Dr. Marcos Ribeiro", "prefeito Marcos Ribeiro"],
        });
        expect(armazem.pessoa("Outra Pessoa")).toBeNull();
    });

    it("remove só as ocorrências de cidade com outras versões", async () => {
        const armazem = new ArmazemResultadosMemoria();
        await armazem.registrarOcorrenciaCidade(ocorrenciaCidade("a", 0, "ner-0"));
        await armazem.registrarOcorrenciaCidade(ocorrenciaCidade("a", 20, "ner-1"));

        expect(await armazem.removerOcorrenciasObsoletas("a", "ner-1", "v1")).toBe(1);
        expect(armazem.resultados("a")?.cidades.map((item) => item.inicio)).toEqual([20]);
    });

    it("descarta todas as gravações da transação que falha", async () => {
        const armazem = new ArmazemResultadosMemoria();

        await expect(
            armazem.transacao(async (gravador) => {
                await gravador.registrarOcorrenciaCidade(ocorrenciaCidade("a", 0));
                throw new Error("falha no meio do artigo");
            })
        ).rejects.toThrow("falha no meio do artigo");

        expect(armazem.resultados("a")).toBeNull();

        await armazem.transacao(async (gravador) => {
            await gravador.registrarOcorrenciaCidade(ocorrenciaCidade("a", 0));
        });
        expect(armazem.resultados("a")?.cidades).toHaveLength(1);
    });

    it("executa transações concorrentes uma de cada vez", async () => {
        const armazem = new ArmazemResultadosMemoria();
        let liberarPrimeira = (): void => {};
        const primeiraPausada = new Promise<void>((resolve) => {
            liberarPrimeira = resolve;
        });

        const primeira = armazem.transacao(async (gravador) => {
            await primeiraPausada;
            await gravador.registrarOcorrenciaCidade(ocorrenciaCidade("a", 0));
        });
        const segunda = armazem.transacao(async (gravador) => {
            await gravador.registrarOcorrenciaCidade(ocorrenciaCidade("b", 0));
        });

        liberarPrimeira();
        await Promise.all([primeira, segunda]);

        expect(armazem.artigos()).toEqual(["a", "b"]);
    });

    it("libera a próxima transação quando a anterior falha", async () => {
        const armazem = new ArmazemResultadosMemoria();

        const falha = armazem.transacao(async () => {
            throw new Error("artigo inválido");
        });
        const seguinte = armazem.transacao(async (gravador) => {
            await gravador.registrarOcorrenciaCidade(ocorrenciaCidade("b", 0));
            return "ok";
        });

        await expect(falha).rejects.toThrow("artigo inválido");
        await expect(seguinte).resolves.toBe("ok");
        expect(armazem.artigos()).toEqual(["b"]);
    });
});

describe("lotes concorrentes no mesmo armazém", () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    function extracaoCom(armazem: ArmazemResultadosMemoria, noticia: NoticiaPendente): ExtracaoService {
        const repositorio = new RepositorioNoticiasMemoria();
        repositorio.enfileirar([noticia]);
        return new ExtracaoService({
            repositorio,
            gravador: armazem,
            motorNer: new MotorNerVazio(),
            resolucao: new ResolucaoService({ gazetteer: criarGazetteer(), versaoNer: "ner-1" }),
        });
    }

    it("mantém os resultados dos dois lotes", async () => {
        vi.spyOn(console, "log").mockImplementation(() => {});
        const armazem = new ArmazemResultadosMemoria();
        const primeira = extracaoCom(armazem, { ...noticia("https://a.test/1", 1), titulo: "Campinas-SP tem chuva" });
        const segunda = extracaoCom(armazem, { ...noticia("https://a.test/2", 1), titulo: "Springfield-MG tem frio" });

        const resumos = await Promise.all([primeira.processarLote(), segunda.processarLote()]);

        expect(resumos.map((resumo) => resumo.atualizadas)).toEqual([1, 1]);
        expect([...armazem.artigos()].sort()).toEqual(["https://a.test/1", "https://a.test/2"]);
        expect(armazem.resultados("https://a.test/1")?.cidades.map((item) => item.cidadeId)).toEqual(["3509502"]);
        expect(armazem.resultados("https://a.test/2")?.cidades.map((item) => item.cidadeId)).toEqual(["3100001"]);
    });
});
