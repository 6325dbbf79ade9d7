import pg from "pg";
import { env } from "./env.js";

// Interface mínima de execução de SQL usada pelos repositórios PostgreSQL
export interface ResultadoSql {
    rows: unknown[];
    rowCount: number | null;
}

export interface ClienteSql {
    query(texto: string, valores?: unknown[]): Promise<ResultadoSql>;
}

export interface ConexaoSql extends ClienteSql {
    release(): void;
}

export interface PoolSql extends ClienteSql {
    connect(): Promise<ConexaoSql>;
}

// Pool singleton, criado no primeiro uso, só quando DATABASE_URL está configurada
let pool: pg.Pool | null = null;

export function obterPool(): pg.Pool {
    if (pool) return pool;

    if (!env.DATABASE_URL) {
        throw new Error("DATABASE_URL não configurada, backend postgres indisponível");
    }

    pool = new pg.Pool({ connectionString: env.DATABASE_URL, max: 10 });
    pool.on("error", (err: Error) => {
        console.warn("[Database] Erro em conexão ociosa do pool:", err.message);
    });
    return pool;
}

// Adapta o pool do pg para a interface usada pelos repositórios
export function clienteSql(origem: pg.Pool): PoolSql {
    return {
        query: (texto, valores) => origem.query(texto, valores),
        connect: async () => {
            const conexao = await origem.connect();
            return {
                query: (texto, valores) => conexao.query(texto, valores),
                release: () => conexao.release(),
            };
        },
    };
}

// Graceful shutdown: fecha o pool se ele foi aberto
export async function encerrarPool(): Promise<void> {
    if (!pool) return;
    const atual = pool;
    pool = null;
    await atual.end();
}
