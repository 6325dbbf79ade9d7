import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import type { Container } from "./container.js";
import { catalogoRoutes } from "./routes/catalogo.routes.js";
import { extracaoRoutes } from "./routes/extracao.routes.js";
import { healthRoutes } from "./routes/health.routes.js";

export interface OpcoesApp {
    // Nível do logger do Fastify ("silent" nos testes)
    nivelLog?: string;
}

// Monta a instância Fastify com plugins e rotas, sem abrir porta
export async function construirApp(container: Container, opcoes: OpcoesApp = {}): Promise<FastifyInstance> {
    const app = Fastify({
        logger: {
            level: opcoes.nivelLog ?? "info",
        },
    });

    // Plugins de segurança e CORS
    await app.register(cors, { origin: true, methods: ["GET", "HEAD", "POST", "OPTIONS"] });
    await app.register(helmet);

    // Rotas
    await app.register(healthRoutes, { prefix: "/", container });
    await app.register(catalogoRoutes, { prefix: "/catalogo", container });
    await app.register(extracaoRoutes, { prefix: "/extracao", container });

    // Graceful shutdown: fecha pool e cache ao parar o servidor
    app.addHook("onClose", async () => {
        await container.encerrar();
    });

    return app;
}
