/**
 * Adaptadores PostgreSQL (pg) das portas de notícias e de resultados.
 *
 * Upserts usam ON CONFLICT nas chaves naturais, então reprocessar um artigo
 * com as mesmas versões não duplica linhas.
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { ClienteSql, PoolSql } from "../config/database.js";
import type { GravadorResultados, RepositorioNoticias } from "../types/contratos.js";
import type {
    NoticiaPendente,
    OcorrenciaCidade,
    OcorrenciaPessoa,
    ResumoCidadesArtigo,
} from "../types/index.js";

// O .sql fica em src/database; o caminho vale tanto para src quanto para dist
const ARQUIVO_SCHEMA = new URL("../../src/database/schema.sql", import.meta.url);

const linhaNoticiaSchema = z.object({
    url: z.string(),
    titulo: z.string().nullable(),
    corpo: z.string().nullable(),
    publicada_em: z.coerce.date(),
    fonte: z.string().nullable(),
    versao_ner: z.string().nullable(),
    versao_gazetteer: z.string().nullable(),
});

const linhaIdSchema = z.object({ id: z.string() });

// Cria as tabelas e índices (comando `banco migrar`)
export async function aplicarSchema(cliente: ClienteSql): Promise<void> {
    const sql = await readFile(ARQUIVO_SCHEMA, "utf8");
    await cliente.query(sql);
}

export class RepositorioNoticiasPostgres implements RepositorioNoticias {
    constructor(private readonly cliente: ClienteSql) {}

    async buscarPendentes(tamanho: number, versaoNer: string, versaoGazetteer: string): Promise<NoticiaPendente[]> {
        const { rows } = await this.cliente.query(
            `SELECT url, titulo, corpo, publicada_em, fonte, versao_ner, versao_gazetteer
               FROM noticias
              WHERE versao_ner IS DISTINCT FROM $1
                 OR versao_gazetteer IS DISTINCT FROM $2
              ORDER BY publicada_em ASC, url ASC
              LIMIT $3`,
            [versaoNer, versaoGazetteer, tamanho]
        );

        return rows.map((linha) => {
            const noticia = linhaNoticiaSchema.parse(linha);
            return {
                url: noticia.url,
                titulo: noticia.titulo ?? "",
                corpo: noticia.corpo ?? "",
                publicadaEm: noticia.publicada_em,
                fonte: noticia.fonte,
                versaoNer: noticia.versao_ner,
                versaoGazetteer: noticia.versao_gazetteer,
            };
        });
    }

    async marcarProcessada(url: string, versaoNer: string, versaoGazetteer: string, em: Date): Promise<void> {
        await this.cliente.query(
            `UPDATE noticias
                SET versao_ner = $2, versao_gazetteer = $3, processada_em = $4, erro = NULL, erro_em = NULL
              WHERE url = $1`,
            [url, versaoNer, versaoGazetteer, em]
        );
    }

    async marcarErro(url: string, mensagem: string): Promise<void> {
        await this.cliente.query(`UPDATE noticias SET erro = $2, erro_em = now() WHERE url = $1`, [url, mensagem]);
    }
}

export class GravadorResultadosPostgres implements GravadorResultados {
    /**
     * @param cliente - Pool (abre uma conexão por transação) ou conexão já em transação
     */
    constructor(
        private readonly cliente: ClienteSql,
        private readonly pool: PoolSql | null = null
    ) {}

    async garantirPessoa(nomeCanonico: string, aliases: Iterable<string>): Promise<string> {
        const { rows } = await this.cliente.query(
            `INSERT INTO pessoas (nome_canonico)
             VALUES ($1)
             ON CONFLICT (nome_canonico) DO UPDATE SET atualizado_em = now()
             RETURNING id`,
            [nomeCanonico]
        );
        const { id } = linhaIdSchema.parse(rows[0]);

        for (const alias of aliases) {
            await this.cliente.query(
                `INSERT INTO pessoas_aliases (pessoa_id, alias) VALUES ($1, $2)
                 ON CONFLICT (pessoa_id, alias) DO NOTHING`,
                [id, alias]
            );
        }

        return id;
    }

    async registrarOcorrenciaPessoa(ocorrencia: OcorrenciaPessoa): Promise<void> {
        await this.cliente.query(
            `INSERT INTO noticias_pessoas
                (noticia_url, pessoa_id, superficie, start_offset, end_offset, frase, metodo, confianca)
             VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
             ON CONFLICT (noticia_url, start_offset, end_offset) DO UPDATE SET
                pessoa_id = EXCLUDED.pessoa_id,
                superficie = EXCLUDED.superficie,
                frase = EXCLUDED.frase,
                metodo = EXCLUDED.metodo,
                confianca = EXCLUDED.confianca`,
            [
                ocorrencia.artigoUrl,
                ocorrencia.pessoaId,
                ocorrencia.superficie,
                ocorrencia.inicio,
                ocorrencia.fim,
                ocorrencia.frase,
                ocorrencia.metodo,
                ocorrencia.confianca,
            ]
        );
    }

    async registrarOcorrenciaCidade(ocorrencia: OcorrenciaCidade): Promise<void> {
        await this.cliente.query(
            `INSERT INTO noticias_cidades
                (noticia_url, superficie, start_offset, end_offset, uf_hint, status, cidade_id, candidatos,
                 confianca, frase, metodo, versao_ner, versao_gazetteer)
             VALUES ($1, $2, $3, $4, $5, $6, $7, $8::jsonb, $9, $10, $11, $12, $13)
             ON CONFLICT (noticia_url, start_offset, end_offset) DO UPDATE SET
                superficie = EXCLUDED.superficie,
                uf_hint = EXCLUDED.uf_hint,
                status = EXCLUDED.status,
                cidade_id = EXCLUDED.cidade_id,
                candidatos = EXCLUDED.candidatos,
                confianca = EXCLUDED.confianca,
                frase = EXCLUDED.frase,
                metodo = EXCLUDED.metodo,
                versao_ner = EXCLUDED.versao_ner,
                versao_gazetteer = EXCLUDED.versao_gazetteer,
                atualizado_em = now()`,
            [
                ocorrencia.artigoUrl,
                ocorrencia.superficie,
                ocorrencia.inicio,
                ocorrencia.fim,
                ocorrencia.ufHint,
                ocorrencia.status,
                ocorrencia.cidadeId,
                JSON.stringify(ocorrencia.candidatos),
                ocorrencia.confianca,
                ocorrencia.frase,
                ocorrencia.metodo,
                ocorrencia.versaoNer,
                ocorrencia.versaoGazetteer,
            ]
        );
    }

    async registrarCidadesArtigo(url: string, resumo: ResumoCidadesArtigo): Promise<void> {
        await this.cliente.query(
            `INSERT INTO noticias_cidades_agregadas (noticia_url, cidade_principal_id, cidades)
             VALUES ($1, $2, $3::jsonb)
             ON CONFLICT (noticia_url) DO UPDATE SET
                cidade_principal_id = EXCLUDED.cidade_principal_id,
                cidades = EXCLUDED.cidades,
                atualizado_em = now()`,
            [url, resumo.principal?.cidadeId ?? null, JSON.stringify(resumo.cidades)]
        );
    }

    async removerOcorrenciasObsoletas(url: string, versaoNer: string, versaoGazetteer: string): Promise<number> {
        const { rowCount } = await this.cliente.query(
            `DELETE FROM noticias_cidades
              WHERE noticia_url = $1 AND (versao_ner <> $2 OR versao_gazetteer <> $3)`,
            [url, versaoNer, versaoGazetteer]
        );
        // Ocorrências de pessoas não guardam versão: o artigo regrava todas
        await this.cliente.query(`DELETE FROM noticias_pessoas WHERE noticia_url = $1`, [url]);
        return rowCount ?? 0;
    }

    /**
     * BEGIN/COMMIT numa conexão dedicada do pool; ROLLBACK em qualquer erro.
     * Sem pool (já dentro de uma transação), executa direto.
     */
    async transacao<T>(fn: (gravador: GravadorResultados) => Promise<T>): Promise<T> {
        if (!this.pool) {
            return fn(this);
        }

        const conexao = await this.pool.connect();
        try {
            await conexao.query("BEGIN");
            const resultado = await fn(new GravadorResultadosPostgres(conexao));
            await conexao.query("COMMIT");
            return resultado;
        } catch (err) {
            await conexao.query("ROLLBACK");
            throw err;
        } finally {
            conexao.release();
        }
    }
}
