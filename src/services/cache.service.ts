/**
 * CacheService — Wrapper simples sobre Redis (ioredis) para cache da aplicação.
 *
 * Fornece get/set/del com serialização JSON automática.
 * Sem REDIS_URL configurada o cache fica desligado; com Redis indisponível,
 * degrada graciosamente (log de warning, retorna null).
 */

import { Redis } from "ioredis";
import { env } from "../config/env.js";

export class CacheService {
    // Conexão Redis criada no primeiro uso, null se desligada ou se a conexão falhar
    private redis: Redis | null = null;
    private inicializado = false;

    constructor(private readonly url: string | undefined) {}

    /**
     * Inicializa a conexão Redis com tratamento de erros.
     * Se o Redis não estiver disponível, o service continua funcionando
     * sem cache (fallback gracioso).
     */
    private conexao(): Redis | null {
        if (this.inicializado) return this.redis;
        this.inicializado = true;

        if (!this.url) return null;

        try {
            this.redis = new Redis(this.url, {
                // Limita tentativas de reconexão para não bloquear a aplicação
                maxRetriesPerRequest: 3,
                // Timeout de conexão de 5 segundos
                connectTimeout: 5000,
                retryStrategy(times: number) {
                    // Para de tentar após 5 tentativas (backoff exponencial limitado)
                    if (times > 5) {
                        console.warn("[CacheService] Redis indisponível, desativando reconexão automática");
                        return null;
                    }
                    // Backoff: 200ms, 400ms, 800ms, 1600ms, 3200ms
                    return Math.min(times * 200, 3200);
                },
            });

            this.redis.on("connect", () => {
                console.log("[CacheService] Conectado ao Redis");
            });

            this.redis.on("error", (err: Error) => {
                console.warn("[CacheService] Erro na conexão Redis:", err.message);
            });
        } catch (err) {
            // Se nem a instanciação funcionar, opera sem cache
            console.warn("[CacheService] Falha ao inicializar Redis, operando sem cache:", err);
            this.redis = null;
        }

        return this.redis;
    }

    /**
     * Busca um valor no cache pelo key.
     * Retorna o valor deserializado ou null se não encontrado / Redis indisponível.
     * O valor volta como `unknown`: quem lê valida o formato.
     */
    async get(key: string): Promise<unknown> {
        try {
            const redis = this.conexao();
            if (!redis) return null;

            const raw = await redis.get(key);
            if (raw === null) return null;

            return JSON.parse(raw);
        } catch (err) {
            console.warn(`[CacheService] Erro ao ler cache key="${key}":`, err);
            return null;
        }
    }

    /**
     * Armazena um valor no cache com TTL em segundos.
     */
    async set(key: string, value: unknown, ttlSeconds: number): Promise<void> {
        try {
            const redis = this.conexao();
            if (!redis) return;

            await redis.set(key, JSON.stringify(value), "EX", ttlSeconds);
        } catch (err) {
            console.warn(`[CacheService] Erro ao gravar cache key="${key}":`, err);
        }
    }

    // Remove uma key do cache (ex: dados brutos de um provedor após --refresh)
    async del(key: string): Promise<void> {
        try {
            const redis = this.conexao();
            if (!redis) return;

            await redis.del(key);
        } catch (err) {
            console.warn(`[CacheService] Erro ao deletar cache key="${key}":`, err);
        }
    }

    // Fecha a conexão (CLI e shutdown do servidor)
    async desconectar(): Promise<void> {
        if (!this.redis) return;
        const redis = this.redis;
        this.redis = null;
        this.inicializado = false;
        await redis.quit();
    }
}

// Exporta como singleton para uso em toda a aplicação
export const cacheService = new CacheService(env.REDIS_URL);
