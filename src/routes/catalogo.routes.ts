import type { FastifyInstance } from "fastify";
import { z } from "zod";
import type { Container } from "../container.js";

const buscaSchema = z.object({
    nome: z.string().trim().min(1, "nome é obrigatório"),
    uf: z
        .string()
        .trim()
        .regex(/^[A-Za-z]{2}$/, "uf deve ter duas letras")
        .transform((uf) => uf.toUpperCase())
        .optional(),
});

// Rotas de consulta ao catálogo carregado no gazetteer
export async function catalogoRoutes(app: FastifyInstance, opts: { container: Container }) {
    const { gazetteer, metadadosCatalogo } = opts.container;

    // GET /catalogo — metadados do catálogo em uso
    app.get("/", async () => {
        return {
            versao: gazetteer.versao,
            total: gazetteer.total,
            metadata: metadadosCatalogo,
        };
    });

    // GET /catalogo/busca?nome=&uf= — candidatos do gazetteer para um nome
    app.get("/busca", async (request, reply) => {
        const parsed = buscaSchema.safeParse(request.query);
        if (!parsed.success) {
            return reply.status(400).send({ erro: "Parâmetros inválidos", detalhes: parsed.error.flatten() });
        }

        const { nome, uf } = parsed.data;
        const candidatos = gazetteer.buscar(nome, uf);
        return { nome, uf: uf ?? null, total: candidatos.length, candidatos };
    });
}
