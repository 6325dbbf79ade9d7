import { construirApp } from "./app.js";
import { env } from "./config/env.js";
import { criarContainer } from "./container.js";

// Bootstrap do servidor: carrega o catálogo, monta as dependências e abre a porta
const container = await criarContainer();
const app = await construirApp(container, {
    nivelLog: env.NODE_ENV === "development" ? "info" : "warn",
});

for (const sinal of ["SIGINT", "SIGTERM"] as const) {
    process.once(sinal, () => {
        app.log.info(`Recebido ${sinal}, encerrando`);
        app.close().then(
            () => process.exit(0),
            (err: unknown) => {
                app.log.error(err);
                process.exit(1);
            }
        );
    });
}

// Iniciar servidor
try {
    await app.listen({ port: env.PORT, host: "0.0.0.0" });
    console.log(`resolucao-cidades-noticias rodando em http://localhost:${env.PORT}`);
} catch (err) {
    app.log.error(err);
    process.exit(1);
}
