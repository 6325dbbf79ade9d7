import { mkdtemp, readFile, rm, stat, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import {
    CatalogoService,
    calcularChecksum,
    limparRegistros,
    type ConfigCatalogo,
} from "../../src/services/catalogo.service.js";
import type { OpcoesProvedor, ProvedorMunicipios } from "../../src/types/contratos.js";
import { ErroIntegridadeCatalogo, ErroProvedor } from "../../src/types/erros.js";
import { FonteCatalogo, type RegistroCidade } from "../../src/types/index.js";
import { carregarMunicipios } from "../helpers.js";

const AGORA = new Date("2026-01-15T12:00:00.000Z");

class ProvedorFalso implements ProvedorMunicipios {
    chamadas: OpcoesProvedor[] = [];

    constructor(
        readonly fonte: FonteCatalogo,
        private readonly resposta: RegistroCidade[] | Error
    ) {}

    async listarMunicipios(opcoes: OpcoesProvedor): Promise<RegistroCidade[]> {
        this.chamadas.push(opcoes);
        if (this.resposta instanceof Error) throw this.resposta;
        return this.resposta;
    }
}

function registro(ibge_id: string, name: string): RegistroCidade {
    return { ibge_id, name, uf: "SP", state: "São Paulo", region: "Sudeste" };
}

describe("limparRegistros()", () => {
    it("descarta sem id ou nome, mantém o primeiro id e ordena numericamente", () => {
        const limpos = limparRegistros([
            registro("10", "Dez"),
            registro(" 9 ", "Nove"),
            registro("abc", "Texto"),
            registro("9", "Nove repetido"),
            registro("", "Sem id"),
            registro("11", "   "),
        ]);

        expect(limpos.map((item) => `${item.ibge_id}:${item.name}`)).toEqual(["9:Nove", "10:Dez", "abc:Texto"]);
    });
});

describe("calcularChecksum()", () => {
    it("não depende da ordem das chaves", () => {
        expect(calcularChecksum([{ a: 1, b: { c: 2, d: 3 } }])).toBe(calcularChecksum([{ b: { d: 3, c: 2 }, a: 1 }]));
        expect(calcularChecksum([{ a: 1 }])).not.toBe(calcularChecksum([{ a: 2 }]));
    });
});

describe("CatalogoService", () => {
    let diretorio: string;
    let config: ConfigCatalogo;

    beforeEach(async () => {
        diretorio = await mkdtemp(path.join(tmpdir(), "catalogo-"));
        config = {
            diretorio,
            versao: "v1",
            fontePrimaria: FonteCatalogo.Ibge,
            minimoRegistros: 5,
            timeoutMs: 1000,
        };
        vi.spyOn(console, "log").mockImplementation(() => {});
        vi.spyOn(console, "warn").mockImplementation(() => {});
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        await rm(diretorio, { recursive: true, force: true });
    });

    it("grava o catálogo e o lê de volta com checksum válido", async () => {
        const municipios = carregarMunicipios();
        const ibge = new ProvedorFalso(FonteCatalogo.Ibge, municipios);
        const service = new CatalogoService([ibge], config, () => AGORA);

        const metadata = await service.construir();

        expect(metadata).toEqual({
            version: "v1",
            source: FonteCatalogo.Ibge,
            primary_source: FonteCatalogo.Ibge,
            downloaded_at: "2026-01-15T12:00:00.000Z",
            record_count: 11,
            checksum: calcularChecksum(limparRegistros(municipios)),
        });
        expect(ibge.chamadas).toEqual([{ timeoutMs: 1000, refresh: false }]);

        const arquivo = await service.carregar(path.join(diretorio, "municipios_br_v1.json"));
        expect(arquivo.metadata).toEqual(metadata);
        expect(arquivo.records.map((item) => item.ibge_id)).toEqual(
            limparRegistros(municipios).map((item) => item.ibge_id)
        );
    });

    it("gera o mesmo arquivo para o mesmo conjunto em qualquer ordem", async () => {
        const municipios = carregarMunicipios();
        const primeiro = new CatalogoService([new ProvedorFalso(FonteCatalogo.Ibge, municipios)], config, () => AGORA);
        const segundo = new CatalogoService(
            [new ProvedorFalso(FonteCatalogo.Ibge, [...municipios].reverse())],
            config,
            () => AGORA
        );

        await primeiro.construir({ saida: path.join(diretorio, "a.json") });
        await segundo.construir({ saida: path.join(diretorio, "b.json") });

        const a = await readFile(path.join(diretorio, "a.json"), "utf8");
        const b = await readFile(path.join(diretorio, "b.json"), "utf8");
        expect(a).toBe(b);
        expect(a.endsWith("}\n")).toBe(true);
    });

    it("reaproveita o arquivo existente sem refresh", async () => {
        const ibge = new ProvedorFalso(FonteCatalogo.Ibge, carregarMunicipios());
        const service = new CatalogoService([ibge], config, () => AGORA);

        const criado = await service.construir();
        const reaproveitado = await service.construir();
        await service.construir({ refresh: true });

        expect(reaproveitado).toEqual(criado);
        expect(ibge.chamadas).toEqual([
            { timeoutMs: 1000, refresh: false },
            { timeoutMs: 1000, refresh: true },
        ]);
    });

    it("usa o provedor secundário quando o primário falha", async () => {
        const ibge = new ProvedorFalso(FonteCatalogo.Ibge, new ErroProvedor("HTTP 503", FonteCatalogo.Ibge));
        const brasilApi = new ProvedorFalso(FonteCatalogo.BrasilApi, carregarMunicipios());
        const service = new CatalogoService([brasilApi, ibge], config, () => AGORA);

        const metadata = await service.construir();

        expect(metadata.source).toBe(FonteCatalogo.BrasilApi);
        expect(metadata.primary_source).toBe(FonteCatalogo.Ibge);
        expect(ibge.chamadas).toHaveLength(1);
    });

    it("respeita a fonte primária escolhida na construção", async () => {
        const ibge = new ProvedorFalso(FonteCatalogo.Ibge, carregarMunicipios());
        const brasilApi = new ProvedorFalso(FonteCatalogo.BrasilApi, carregarMunicipios());
        const service = new CatalogoService([ibge, brasilApi], config, () => AGORA);

        const metadata = await service.construir({ fonte: FonteCatalogo.BrasilApi, versao: "v2" });

        expect(metadata).toMatchObject({ version: "v2", source: "brasilapi", primary_source: "brasilapi" });
        expect(ibge.chamadas).toHaveLength(0);
        await expect(stat(path.join(diretorio, "municipios_br_v2.json"))).resolves.toBeTruthy();
    });

    it("não publica catálogo abaixo do mínimo de registros", async () => {
        const truncado = carregarMunicipios().slice(0, 3);
        const service = new CatalogoService(
            [
                new ProvedorFalso(FonteCatalogo.Ibge, truncado),
                new ProvedorFalso(FonteCatalogo.BrasilApi, new ErroProvedor("timeout")),
            ],
            config,
            () => AGORA
        );

        await expect(service.construir()).rejects.toBeInstanceOf(ErroIntegridadeCatalogo);
        await expect(stat(service.caminhoArquivo())).rejects.toThrow();
    });

    it("lança ErroProvedor quando todas as fontes falham", async () => {
        const service = new CatalogoService(
            [
                new ProvedorFalso(FonteCatalogo.Ibge, new ErroProvedor("HTTP 500")),
                new ProvedorFalso(FonteCatalogo.BrasilApi, new ErroProvedor("timeout")),
            ],
            config,
            () => AGORA
        );

        await expect(service.construir()).rejects.toThrow(
            "Não foi possível obter o catálogo de municípios (ibge: HTTP 500; brasilapi: timeout)"
        );
    });

    it("rejeita versão fora do formato v<número>", async () => {
        const service = new CatalogoService([], config, () => AGORA);
        await expect(service.construir({ versao: "1.0" })).rejects.toBeInstanceOf(RangeError);
    });

    describe("carregar()", () => {
        async function catalogoGravado(): Promise<{ service: CatalogoService; caminho: string }> {
            const service = new CatalogoService(
                [new ProvedorFalso(FonteCatalogo.Ibge, carregarMunicipios())],
                config,
                () => AGORA
            );
            await service.construir();
            return { service, caminho: service.caminhoArquivo() };
        }

        it("recusa registros alterados depois da gravação", async () => {
            const { service, caminho } = await catalogoGravado();
            const conteudo = await readFile(caminho, "utf8");
            await writeFile(caminho, conteudo.replace('"name": "Campinas"', '"name": "Campinas Alterada"'), "utf8");

            await expect(service.carregar(caminho)).rejects.toThrow(/Checksum do catálogo .* não confere/);
        });

        it("recusa record_count divergente", async () => {
            const { service, caminho } = await catalogoGravado();
            const conteudo = await readFile(caminho, "utf8");
            await writeFile(caminho, conteudo.replace('"record_count": 11', '"record_count": 12'), "utf8");

            await expect(service.carregar(caminho)).rejects.toThrow(
                `Catálogo ${caminho} declara 12 registros mas contém 11`
            );
        });

        it("recusa JSON inválido", async () => {
            const caminho = path.join(diretorio, "quebrado.json");
            await writeFile(caminho, "{ metadata:", "utf8");
            const service = new CatalogoService([], config);

            await expect(service.carregar(caminho)).rejects.toBeInstanceOf(ErroIntegridadeCatalogo);
        });

        it("monta o gazetteer com a versão gravada", async () => {
            const { service } = await catalogoGravado();
            const gazetteer = await service.carregarGazetteer();

            expect(gazetteer.versao).toBe("v1");
            expect(gazetteer.total).toBe(11);
        });
    });
});
