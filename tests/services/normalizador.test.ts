/**
 * Testes do NormalizadorService — limpeza de texto, UFs, frases e nomes de pessoas.
 */

import { describe, it, expect } from "vitest";
import { NormalizadorService, normalizadorService } from "../../src/services/normalizador.service.js";

describe("NormalizadorService", () => {
    // ==========================================================================
    // Normalização de nomes
    // ==========================================================================

    describe("normalizar()", () => {
        it("converte para minúsculo e remove acentos", () => {
            expect(normalizadorService.normalizar("Embu-Guaçu")).toBe("embu-guacu");
        });

        it("colapsa múltiplos espaços e faz trim", () => {
            expect(normalizadorService.normalizar("  São   José dos Campos ")).toBe("sao jose dos campos");
        });

        it("trata cedilha e til corretamente", () => {
            expect(normalizadorService.normalizar("Maranhão Açu")).toBe("maranhao acu");
        });
    });

    // ==========================================================================
    // Limpeza do texto da notícia
    // ==========================================================================

    describe("normalizarTexto()", () => {
        it("descarta linhas vazias e de boilerplate, mantendo as quebras", () => {
            const texto = [
                "Chuva forte em Natal.",
                "",
                "  Leia também: outras notícias",
                "Foto: Agência",
                "A prefeitura   decretou emergência.",
            ].join("\n");

            expect(normalizadorService.normalizarTexto(texto)).toBe(
                "Chuva forte em Natal.\nA prefeitura decretou emergência."
            );
        });

        it("aceita padrões extras de boilerplate", () => {
            const normalizador = new NormalizadorService([/^publicidade$/i]);
            expect(normalizador.normalizarTexto("Texto\r\nPUBLICIDADE\nFim")).toBe("Texto\nFim");
        });
    });

    // ==========================================================================
    // Detecção de UFs
    // ==========================================================================

    describe("detectarUfs()", () => {
        it("detecta siglas e nomes completos de estado", () => {
            const ufs = normalizadorService.detectarUfs(
                "Campinas (SP) recebeu visitantes de Minas Gerais e se preparou"
            );
            expect([...ufs].sort()).toEqual(["MG", "SP"]);
        });

        it("exige o acento em Pará", () => {
            expect([...normalizadorService.detectarUfs("Belém, no Pará")]).toEqual(["PA"]);
            expect(normalizadorService.detectarUfs("vai para casa").size).toBe(0);
        });

        it("só aceita SE em maiúsculo", () => {
            expect([...normalizadorService.detectarUfs("Aracaju, SE")]).toEqual(["SE"]);
            expect(normalizadorService.detectarUfs("Se chover, adia").size).toBe(0);
        });

        it("só aceita TO, GO e AM em maiúsculo", () => {
            expect(normalizadorService.detectarUfs("I want to go home, I am tired").size).toBe(0);
            expect([...normalizadorService.detectarUfs("Palmas, TO, e Goiânia, GO")]).toEqual(["TO", "GO"]);
        });
    });

    // ==========================================================================
    // Frase que contém o trecho
    // ==========================================================================

    describe("extrairFrase()", () => {
        it("retorna a frase com a pontuação final", () => {
            const texto = "Primeira frase. Chuva em Natal hoje! Outra.";
            const inicio = texto.indexOf("Natal");
            expect(normalizadorService.extrairFrase(texto, inicio, inicio + 5)).toBe("Chuva em Natal hoje!");
        });

        it("usa a quebra de linha como fronteira", () => {
            const texto = "Título sobre Campinas\nCorpo da notícia.";
            expect(normalizadorService.extrairFrase(texto, 13, 21)).toBe("Título sobre Campinas");
        });

        it("ajusta offsets fora do texto sem lançar erro", () => {
            expect(normalizadorService.extrairFrase("abc", -5, 100)).toBe("abc");
            expect(normalizadorService.extrairFrase("", 0, 3)).toBe("");
        });
    });

    // ==========================================================================
    // Nomes de pessoas
    // ==========================================================================

    describe("normalizarNomePessoa()", () => {
        it("remove títulos e capitaliza mantendo conectores", () => {
            const { nomeCanonico, aliases } = normalizadorService.normalizarNomePessoa("Dr. joão da silva");
            expect(nomeCanonico).toBe("João da Silva");
            expect([...aliases]).toEqual(["Dr. joão da silva"]);
        });

        it("remove cargos, inclusive com prefixo ex-", () => {
            expect(normalizadorService.normalizarNomePessoa("Prefeito Marcos Ribeiro").nomeCanonico).toBe(
                "Marcos Ribeiro"
            );
            expect(normalizadorService.normalizarNomePessoa("ex-prefeito José Alves").nomeCanonico).toBe(
                "José Alves"
            );
        });

        it("não gera alias quando o nome já é canônico", () => {
            expect(normalizadorService.normalizarNomePessoa("Ana Paula").aliases.size).toBe(0);
        });
    });

    describe("normalizarComOffsets()", () => {
        it("mapeia cada caractere dobrado para o índice original", () => {
            const { texto, offsets } = normalizadorService.normalizarComOffsets("São-Paulo");
            expect(texto).toBe("sao paulo");
            expect(offsets).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8]);
        });
    });
});
