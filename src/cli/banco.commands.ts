import type { Command } from "commander";
import { clienteSql, encerrarPool, obterPool } from "../config/database.js";
import { aplicarSchema } from "../database/postgres.repository.js";

export function registerBancoCommands(program: Command): void {
    const banco = program.command("banco").description("Banco PostgreSQL do pipeline de extração");

    banco
        .command("migrar")
        .description("Cria tabelas e índices (idempotente)")
        .action(async () => {
            try {
                await aplicarSchema(clienteSql(obterPool()));
                console.log("Esquema aplicado.");
            } catch (error) {
                console.error(`Falha ao aplicar o esquema: ${error instanceof Error ? error.message : String(error)}`);
                process.exitCode = 1;
            } finally {
                await encerrarPool();
            }
        });
}
