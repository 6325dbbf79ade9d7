import { readFileSync } from "node:fs";
import { z } from "zod";
import { Gazetteer } from "../src/services/gazetteer.service.js";
import type { RegistroCidade } from "../src/types/index.js";
import { registroCidadeSchema } from "../src/types/schemas.js";

const ARQUIVO_MUNICIPIOS = new URL("./fixtures/municipios.json", import.meta.url);

// Catálogo reduzido usado nos testes (ids fictícios onde não há homônimo real)
export function carregarMunicipios(): RegistroCidade[] {
    return z.array(registroCidadeSchema).parse(JSON.parse(readFileSync(ARQUIVO_MUNICIPIOS, "utf8")));
}

export function criarGazetteer(versao = "v1"): Gazetteer {
    return new Gazetteer(carregarMunicipios(), versao);
}
