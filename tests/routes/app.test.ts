import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import type { FastifyInstance } from "fastify";
import { construirApp } from "../../src/app.js";
import { montarContainer } from "../../src/container.js";
import { RepositorioNoticiasMemoria } from "../../src/database/memoria.repository.js";
import { criarGazetteer } from "../helpers.js";

const URL_NOTICIA = "https://noticias.test/politica/obras?id=7";

describe("rotas HTTP", () => {
    let app: FastifyInstance;

    beforeEach(async () => {
        vi.spyOn(console, "log").mockImplementation(() => {});
        app = await construirApp(montarContainer({ gazetteer: criarGazetteer(), versaoNer: "ner-1" }), {
            nivelLog: "silent",
        });
    });

    afterEach(async () => {
        await app.close();
        vi.restoreAllMocks();
    });

    it("GET /health informa a versão do gazetteer", async () => {
        const response = await app.inject({ method: "GET", url: "/health" });

        expect(response.statusCode).toBe(200);
        expect(response.json()).toMatchObject({
            status: "ok",
            service: "resolucao-cidades-noticias",
            gazetteer: { versao: "v1", municipios: 11 },
        });
    });

    it("GET /catalogo devolve versão e total", async () => {
        const response = await app.inject({ method: "GET", url: "/catalogo" });
        expect(response.json()).toEqual({ versao: "v1", total: 11, metadata: null });
    });

    it("GET /catalogo/busca filtra pela UF", async () => {
        const response = await app.inject({ method: "GET", url: "/catalogo/busca?nome=Springfield&uf=sp" });
        const corpo = response.json();

        expect(corpo).toMatchObject({ nome: "Springfield", uf: "SP", total: 1 });
        expect(corpo.candidatos[0].ibge_id).toBe("3500001");
    });

    it("GET /catalogo/busca sem nome responde 400", async () => {
        const response = await app.inject({ method: "GET", url: "/catalogo/busca" });

        expect(response.statusCode).toBe(400);
        expect(response.json().erro).toBe("Parâmetros inválidos");
    });

    it("POST /extracao/resolver resolve um texto avulso", async () => {
        const response = await app.inject({
            method: "POST",
            url: "/extracao/resolver",
            payload: { texto: "O prefeito de Springfield-SP anunciou obras." },
        });
        const corpo = response.json();

        expect(response.statusCode).toBe(200);
        expect(corpo.url).toBe("adhoc://texto");
        expect(corpo.cidades).toHaveLength(1);
        expect(corpo.cidades[0]).toMatchObject({ cidadeId: "3500001", status: "resolved", confianca: 0.95 });
        expect(corpo.resumo.principal.cidadeId).toBe("3500001");
    });

    it("POST /extracao/resolver encontra nomes do catálogo sem gatilho", async () => {
        const response = await app.inject({
            method: "POST",
            url: "/extracao/resolver",
            payload: { texto: "Chuva em Campinas." },
        });

        expect(response.json().cidades).toEqual([
            expect.objectContaining({
                superficie: "Campinas",
                cidadeId: "3509502",
                status: "resolved",
                confianca: 0.8,
                metodo: "automaton",
            }),
        ]);
    });

    it("enfileira, processa e consulta os resultados de uma notícia", async () => {
        const enfileirar = await app.inject({
            method: "POST",
            url: "/extracao/enfileirar",
            payload: {
                noticias: [
                    {
                        url: URL_NOTICIA,
                        titulo: "Obras",
                        corpo: "O prefeito de Springfield-SP anunciou obras.",
                        publicadaEm: "2026-01-10T08:00:00.000Z",
                    },
                ],
            },
        });
        expect(enfileirar.statusCode).toBe(202);
        expect(enfileirar.json()).toEqual({ enfileiradas: 1, total: 1 });

        const processar = await app.inject({ method: "POST", url: "/extracao/processar", payload: {} });
        expect(processar.json()).toMatchObject({ processadas: 1, atualizadas: 1, resolvidas: 1, erros: [] });

        const lista = await app.inject({ method: "GET", url: "/extracao/resultados" });
        expect(lista.json()).toEqual({ total: 1, artigos: [URL_NOTICIA] });

        const detalhe = await app.inject({
            method: "GET",
            url: `/extracao/resultados/${encodeURIComponent(URL_NOTICIA)}`,
        });
        expect(detalhe.statusCode).toBe(200);
        expect(detalhe.json().cidades[0]).toMatchObject({ superficie: "Springfield-SP", cidadeId: "3500001" });
    });

    it("responde 404 para notícia sem resultados", async () => {
        const response = await app.inject({
            method: "GET",
            url: `/extracao/resultados/${encodeURIComponent("https://noticias.test/nada")}`,
        });

        expect(response.statusCode).toBe(404);
        expect(response.json().erro).toBe("Nenhum resultado para esta notícia");
    });

    it("recusa notícias sem URL válida", async () => {
        const response = await app.inject({
            method: "POST",
            url: "/extracao/enfileirar",
            payload: [{ url: "sem-url", titulo: "x" }],
        });

        expect(response.statusCode).toBe(400);
        expect(response.json().erro).toBe("Notícias inválidas");
    });
});

describe("rotas HTTP com repositório externo", () => {
    it("recusa enfileirar quando a fila não é a de memória", async () => {
        const app = await construirApp(
            montarContainer({ gazetteer: criarGazetteer(), repositorio: new RepositorioNoticiasMemoria() }),
            { nivelLog: "silent" }
        );

        const response = await app.inject({
            method: "POST",
            url: "/extracao/enfileirar",
            payload: { url: URL_NOTICIA, titulo: "Obras" },
        });

        expect(response.statusCode).toBe(409);
        await app.close();
    });
});
