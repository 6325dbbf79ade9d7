import type { FastifyInstance } from "fastify";
import type { Container } from "../container.js";

// Rota de health check
export async function healthRoutes(app: FastifyInstance, opts: { container: Container }) {
    app.get("/health", async () => {
        return {
            status: "ok",
            service: "resolucao-cidades-noticias",
            version: "0.1.0",
            uptime: process.uptime(),
            gazetteer: {
                versao: opts.container.gazetteer.versao,
                municipios: opts.container.gazetteer.total,
            },
        };
    });
}
