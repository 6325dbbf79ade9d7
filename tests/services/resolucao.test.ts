import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { ResolucaoService } from "../../src/services/resolucao.service.js";
import { RotuloEntidade, StatusResolucao, type TrechoEntidade } from "../../src/types/index.js";
import { criarGazetteer } from "../helpers.js";

const URL_ARTIGO = "https://noticias.test/artigo-1";

function local(texto: string, inicio: number, fim = inicio + texto.length): TrechoEntidade {
    return { texto, rotulo: RotuloEntidade.Local, inicio, fim, confianca: 0.85, metodo: "ner" };
}

describe("ResolucaoService", () => {
    const resolucao = new ResolucaoService({ gazetteer: criarGazetteer(), versaoNer: "ner-test" });

    beforeEach(() => {
        vi.spyOn(console, "warn").mockImplementation(() => {});
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it("dá precedência à UF explícita sobre homônimos de outros estados", () => {
        const texto = "O prefeito de Springfield-SP anunciou obras.";
        const [ocorrencia, ...resto] = resolucao.resolver({ url: URL_ARTIGO, texto }, []);

        expect(resto).toEqual([]);
        expect(ocorrencia).toEqual({
            artigoUrl: URL_ARTIGO,
            superficie: "Springfield-SP",
            inicio: 14,
            fim: 28,
            ufHint: "SP",
            status: StatusResolucao.Resolvida,
            cidadeId: "3500001",
            candidatos: [{ cidadeId: "3500001", nome: "Springfield", uf: "SP", score: 0.95 }],
            confianca: 0.95,
            frase: texto,
            metodo: "cidade-uf",
            versaoNer: "ner-test",
            versaoGazetteer: "v1",
        });
    });

    it("mantém a ambiguidade quando duas UFs do documento têm o mesmo nome", () => {
        const texto = "Moradores de São José protestaram. A chuva atingiu SC e RN.";
        const [ocorrencia] = resolucao.resolver({ url: URL_ARTIGO, texto }, [local("São José", 13)]);

        expect(ocorrencia.status).toBe(StatusResolucao.Ambigua);
        expect(ocorrencia.cidadeId).toBeNull();
        expect(ocorrencia.confianca).toBe(0.45);
        expect(ocorrencia.candidatos.map((candidato) => candidato.cidadeId)).toEqual(["2412906", "4216602"]);
        expect(ocorrencia.candidatos.map((candidato) => candidato.score)).toEqual([0.45, 0.45]);
    });

    it("resolve pelo contexto quando só uma UF tem o município", () => {
        const texto = "Moradores de São José protestaram. A chuva atingiu SC.";
        const [ocorrencia] = resolucao.resolver({ url: URL_ARTIGO, texto }, [local("São José", 13)]);

        expect(ocorrencia.status).toBe(StatusResolucao.Resolvida);
        expect(ocorrencia.cidadeId).toBe("4216602");
        expect(ocorrencia.confianca).toBe(0.9);
    });

    it("marca como estrangeira a menção fora do catálogo", () => {
        const texto = "Turistas visitaram Paris.";
        const [ocorrencia] = resolucao.resolver({ url: URL_ARTIGO, texto }, [local("Paris", 19)]);

        expect(ocorrencia).toMatchObject({
            superficie: "Paris",
            status: StatusResolucao.Estrangeira,
            cidadeId: null,
            candidatos: [],
            confianca: 0,
        });
    });

    it("reduz a confiança de nomes que também são palavras comuns", () => {
        const semUf = resolucao.resolver({ url: URL_ARTIGO, texto: "Feliz Natal a todos." }, [local("Natal", 6)]);
        const comUf = resolucao.resolver({ url: URL_ARTIGO, texto: "Natal (RN) amanheceu com sol." }, [
            local("Natal", 0),
        ]);

        expect(semUf[0]).toMatchObject({ status: StatusResolucao.Resolvida, cidadeId: "2408102", confianca: 0.4 });
        expect(comUf[0]).toMatchObject({ status: StatusResolucao.Resolvida, cidadeId: "2408102", confianca: 0.9 });
    });

    it("usa 0.8 para nome único no país sem UF de apoio", () => {
        const [ocorrencia] = resolucao.resolver({ url: URL_ARTIGO, texto: "Chuva em Campinas." }, [
            local("Campinas", 9),
        ]);
        expect(ocorrencia.confianca).toBe(0.8);
        expect(ocorrencia.cidadeId).toBe("3509502");
    });

    it("segue pelo contexto quando a UF explícita não tem candidato", () => {
        const [ocorrencia] = resolucao.resolver({ url: URL_ARTIGO, texto: "Visita a Springfield-RJ." }, []);

        expect(ocorrencia.ufHint).toBe("RJ");
        expect(ocorrencia.status).toBe(StatusResolucao.Ambigua);
        expect(ocorrencia.candidatos.map((candidato) => candidato.uf)).toEqual(["MG", "SP"]);
    });

    it("descarta palavras capitalizadas antes do nome no padrão cidade-uf", () => {
        const [ocorrencia] = resolucao.resolver({ url: URL_ARTIGO, texto: "Ontem Campinas-SP teve chuva." }, []);

        expect(ocorrencia).toMatchObject({
            superficie: "Campinas-SP",
            inicio: 6,
            fim: 17,
            cidadeId: "3509502",
            confianca: 0.95,
        });
    });

    it("funde NER e padrões, mantendo o trecho com UF", () => {
        const texto = "O prefeito de Springfield-SP anunciou obras.";
        const ocorrencias = resolucao.resolver({ url: URL_ARTIGO, texto }, [local("Springfield", 14)]);

        expect(ocorrencias).toHaveLength(1);
        expect(ocorrencias[0].metodo).toBe("cidade-uf");
    });

    it("ignora pessoas e descarta trechos com offsets inválidos", () => {
        const texto = "Chuva em Campinas.";
        const ocorrencias = resolucao.resolver({ url: URL_ARTIGO, texto }, [
            { ...local("Campinas", 9), rotulo: RotuloEntidade.Pessoa },
            local("Campinas", 9, 40),
            local("Campinas", 0),
        ]);

        expect(ocorrencias).toEqual([]);
        expect(console.warn).toHaveBeenCalledTimes(2);
    });
});
