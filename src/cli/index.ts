/**
 * CLI do serviço de resolução de cidades em notícias.
 *
 * Grupos de comandos:
 * - catalogo: construir | verificar
 * - extracao: processar
 * - banco:    migrar
 */

import { Command } from "commander";
import { registerBancoCommands } from "./banco.commands.js";
import { registerCatalogoCommands } from "./catalogo.commands.js";
import { registerExtracaoCommands } from "./extracao.commands.js";

export const CLI_NAME = "cidades-noticias";
export const CLI_VERSION = "0.1.0";

export function criarPrograma(): Command {
    const program = new Command();
    program.name(CLI_NAME).version(CLI_VERSION).description("Resolução de menções a municípios brasileiros em notícias");

    registerCatalogoCommands(program);
    registerExtracaoCommands(program);
    registerBancoCommands(program);

    return program;
}
