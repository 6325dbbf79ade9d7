/**
 * AnthropicNerService — Reconhecimento de pessoas e locais via Claude (Anthropic).
 *
 * O modelo devolve apenas as superfícies e os rótulos; os offsets são
 * calculados localmente procurando cada superfície no texto, já que posições
 * geradas pelo LLM não são confiáveis.
 */

import Anthropic from "@anthropic-ai/sdk";
import { z } from "zod";
import type { MotorNer } from "../../types/contratos.js";
import type { RotuloEntidade, TrechoEntidade } from "../../types/index.js";
import { localizarEntidades, METODO_NER, ROTULOS_EXTERNOS } from "../ner.service.js";

// Modelo mais barato da Anthropic, suficiente para extração com JSON
const MODELO = "claude-haiku-4-5-20251001";

// Temperatura baixa para respostas determinísticas e consistentes
const TEMPERATURE = 0;

const MAX_TOKENS = 1024;

// Confiança atribuída às entidades vindas do LLM
const CONFIANCA_LLM = 0.8;

const respostaSchema = z.object({
    entidades: z.array(
        z.object({
            texto: z.string(),
            tipo: z.string(),
        })
    ),
});

export class AnthropicNerService implements MotorNer {
    readonly nome = "anthropic";

    /** Cliente da Anthropic, inicializado apenas se a API key estiver presente */
    private client: Anthropic | null = null;

    constructor(apiKey: string | undefined) {
        if (apiKey) {
            this.client = new Anthropic({ apiKey });
        } else {
            console.warn("[AnthropicNerService] ANTHROPIC_API_KEY não configurada, NER via LLM desabilitado.");
        }
    }

    /**
     * Extrai pessoas e locais do texto.
     * Falha na API é propagada (o artigo é marcado com erro e volta na próxima rodada).
     */
    async analisar(texto: string): Promise<TrechoEntidade[]> {
        if (!this.client || !texto.trim()) {
            return [];
        }

        const prompt = `Você é um anotador de entidades em notícias brasileiras.
Liste as PESSOAS e os LOCAIS (cidades, estados, países) citados no texto abaixo.
Copie cada entidade exatamente como aparece no texto, sem corrigir grafia.

Texto:
"""
${texto}
"""

Responda APENAS em JSON: {"entidades": [{"texto": "trecho exato", "tipo": "PESSOA" | "LOCAL"}]}`;

        const response = await this.client.messages.create({
            model: MODELO,
            max_tokens: MAX_TOKENS,
            temperature: TEMPERATURE,
            messages: [{ role: "user", content: prompt }],
        });

        const textoResposta = response.content
            .flatMap((block) => (block.type === "text" ? [block.text] : []))
            .join("");

        return this.interpretarResposta(texto, textoResposta);
    }

    /**
     * Faz o parse da resposta do LLM e converte em trechos do texto original.
     * Trata code blocks de markdown e texto extra em volta do JSON.
     * Resposta inválida é logada e resulta em lista vazia.
     */
    interpretarResposta(texto: string, resposta: string): TrechoEntidade[] {
        try {
            // Remove possíveis code blocks de markdown (```json ... ```)
            const limpo = resposta
                .replace(/```json\s*/gi, "")
                .replace(/```\s*/g, "")
                .trim();

            const jsonMatch = limpo.match(/\{[\s\S]*\}/);
            if (!jsonMatch) {
                throw new Error("Nenhum JSON encontrado na resposta do LLM");
            }

            const parsed = respostaSchema.parse(JSON.parse(jsonMatch[0]));

            const entidades: Array<{ texto: string; rotulo: RotuloEntidade }> = [];
            for (const entidade of parsed.entidades) {
                const rotulo = ROTULOS_EXTERNOS[entidade.tipo.toUpperCase()];
                if (rotulo) entidades.push({ texto: entidade.texto, rotulo });
            }

            return localizarEntidades(texto, entidades, CONFIANCA_LLM, METODO_NER);
        } catch (error) {
            console.error(
                "[AnthropicNerService] Erro ao parsear resposta do LLM:",
                error instanceof Error ? error.message : error,
                "| Resposta bruta:",
                resposta.substring(0, 500)
            );
            return [];
        }
    }
}
