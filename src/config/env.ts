import { z } from "zod";
import { FonteCatalogo } from "../types/index.js";

const backendSchema = z.enum(["memoria", "postgres"]);

// Schema de validação das variáveis de ambiente
const envSchema = z
    .object({
        // Servidor
        PORT: z.coerce.number().default(3003),
        NODE_ENV: z.enum(["development", "production", "test"]).default("development"),

        // Banco PostgreSQL (notícias pendentes e resultados da extração)
        DATABASE_URL: z.string().url().optional(),

        // Redis para cache dos dados brutos dos provedores (opcional)
        REDIS_URL: z.string().optional(),

        // Claude API para o NER via LLM
        ANTHROPIC_API_KEY: z.string().optional(),

        // Versões do pipeline: mudar qualquer uma delas reprocessa as notícias
        NER_VERSION: z.string().min(1).default("dev"),
        GAZETTEER_VERSION: z.string().min(1).optional(),

        // Catálogo de municípios
        CATALOGO_VERSAO: z.string().regex(/^v\d+$/, "Versão deve seguir o formato v<número>").default("v1"),
        CATALOGO_DIR: z.string().default("data"),
        CATALOGO_FONTE_PRIMARIA: z.nativeEnum(FonteCatalogo).default(FonteCatalogo.Ibge),
        CATALOGO_MINIMO_REGISTROS: z.coerce.number().int().positive().default(5000),
        PROVEDOR_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),

        // Extração em lote
        EXTRACAO_TAMANHO_LOTE: z.coerce.number().int().positive().default(500),
        EXTRACAO_INTERVALO_SEGUNDOS: z.coerce.number().positive().default(60),
        EXTRACAO_BACKEND_NOTICIAS: backendSchema.default("memoria"),
        EXTRACAO_BACKEND_RESULTADOS: backendSchema.default("memoria"),
        // gazetteer: nomes do catálogo no texto; anthropic: LLM; nenhum: só os padrões
        EXTRACAO_NER: z.enum(["gazetteer", "anthropic", "nenhum"]).default("gazetteer"),

        // Regexes extras de boilerplate, separadas por "||"
        BOILERPLATE_PADROES: z
            .string()
            .optional()
            .transform((valor) =>
                (valor ?? "")
                    .split("||")
                    .map((padrao) => padrao.trim())
                    .filter(Boolean)
            ),
    })
    .transform((dados) => ({
        ...dados,
        // Sem versão explícita, o gazetteer acompanha a versão do catálogo
        GAZETTEER_VERSION: dados.GAZETTEER_VERSION ?? dados.CATALOGO_VERSAO,
    }))
    .superRefine((dados, ctx) => {
        const usaPostgres =
            dados.EXTRACAO_BACKEND_NOTICIAS === "postgres" || dados.EXTRACAO_BACKEND_RESULTADOS === "postgres";
        if (usaPostgres && !dados.DATABASE_URL) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ["DATABASE_URL"],
                message: "Obrigatória quando algum backend de extração é postgres",
            });
        }
        if (dados.EXTRACAO_NER === "anthropic" && !dados.ANTHROPIC_API_KEY) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ["ANTHROPIC_API_KEY"],
                message: "Obrigatória quando EXTRACAO_NER=anthropic",
            });
        }
    });

export type Env = z.infer<typeof envSchema>;

// Valida e exporta as variáveis de ambiente
function loadEnv(): Env {
    const result = envSchema.safeParse(process.env);

    if (!result.success) {
        console.error("Variáveis de ambiente inválidas:", result.error.format());
        process.exit(1);
    }

    return result.data;
}

export const env = loadEnv();
