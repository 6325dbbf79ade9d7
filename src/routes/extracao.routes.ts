import type { FastifyInstance } from "fastify";
import { z } from "zod";
import type { Container } from "../container.js";
import type { NoticiaPendente } from "../types/index.js";

const noticiaSchema = z.object({
    url: z.string().url(),
    titulo: z.string().default(""),
    corpo: z.string().default(""),
    publicadaEm: z.coerce.date().optional(),
    fonte: z.string().nullish(),
});

// Aceita uma notícia, uma lista ou { noticias: [...] }
const enfileirarSchema = z.union([
    noticiaSchema.transform((noticia) => [noticia]),
    z.array(noticiaSchema).min(1),
    z.object({ noticias: z.array(noticiaSchema).min(1) }).transform((corpo) => corpo.noticias),
]);

const processarSchema = z.object({
    tamanhoLote: z.coerce.number().int().positive().max(5000).optional(),
    dryRun: z.boolean().optional(),
});

const resolverSchema = z.object({
    texto: z.string().min(1, "texto é obrigatório"),
    titulo: z.string().default(""),
    url: z.string().default("adhoc://texto"),
});

// Rotas do pipeline de extração (fila, lote, resolução ad-hoc e resultados)
export async function extracaoRoutes(app: FastifyInstance, opts: { container: Container }) {
    const { extracao, fila, armazem } = opts.container;

    // POST /extracao/enfileirar — adiciona notícias à fila em memória
    app.post("/enfileirar", async (request, reply) => {
        if (!fila) {
            return reply
                .status(409)
                .send({ erro: "Fila HTTP disponível apenas com EXTRACAO_BACKEND_NOTICIAS=memoria" });
        }

        const parsed = enfileirarSchema.safeParse(request.body);
        if (!parsed.success) {
            return reply.status(400).send({ erro: "Notícias inválidas", detalhes: parsed.error.flatten() });
        }

        const noticias: NoticiaPendente[] = parsed.data.map((noticia) => ({
            url: noticia.url,
            titulo: noticia.titulo,
            corpo: noticia.corpo,
            publicadaEm: noticia.publicadaEm ?? new Date(),
            fonte: noticia.fonte ?? null,
        }));

        const enfileiradas = fila.enfileirar(noticias);
        return reply.status(202).send({ enfileiradas, total: fila.total });
    });

    // POST /extracao/processar — processa um lote (ou simula com dryRun)
    app.post("/processar", async (request, reply) => {
        const parsed = processarSchema.safeParse(request.body ?? {});
        if (!parsed.success) {
            return reply.status(400).send({ erro: "Parâmetros inválidos", detalhes: parsed.error.flatten() });
        }

        return extracao.processarLote(parsed.data);
    });

    // POST /extracao/resolver — resolve um texto avulso, sem gravar nada
    app.post("/resolver", async (request, reply) => {
        const parsed = resolverSchema.safeParse(request.body);
        if (!parsed.success) {
            return reply.status(400).send({ erro: "Texto inválido", detalhes: parsed.error.flatten() });
        }

        const { url, titulo, texto } = parsed.data;
        return extracao.analisarArtigo({ url, titulo, corpo: texto });
    });

    // GET /extracao/resultados — URLs com resultados gravados
    app.get("/resultados", async (_request, reply) => {
        if (!armazem) {
            return reply
                .status(409)
                .send({ erro: "Consulta disponível apenas com EXTRACAO_BACKEND_RESULTADOS=memoria" });
        }

        const artigos = armazem.artigos();
        return { total: artigos.length, artigos };
    });

    // GET /extracao/resultados/<url da notícia> — ocorrências e resumo de um artigo
    app.get("/resultados/*", async (request, reply) => {
        if (!armazem) {
            return reply
                .status(409)
                .send({ erro: "Consulta disponível apenas com EXTRACAO_BACKEND_RESULTADOS=memoria" });
        }

        const { "*": alvo } = z.object({ "*": z.string() }).parse(request.params);

        // A URL pode chegar codificada (encodeURIComponent) ou já decodificada
        let resultados = armazem.resultados(alvo);
        if (!resultados && alvo.includes("%")) {
            try {
                resultados = armazem.resultados(decodeURIComponent(alvo));
            } catch (err) {
                request.log.warn({ err, alvo }, "URL com codificação inválida");
            }
        }

        if (!resultados) {
            return reply.status(404).send({ erro: "Nenhum resultado para esta notícia", url: alvo });
        }

        return resultados;
    });
}
