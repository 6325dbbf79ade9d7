import type { MotorNer } from "../types/contratos.js";
import { RotuloEntidade, type TrechoEntidade } from "../types/index.js";

// Método gravado nos trechos vindos de modelos de NER
export const METODO_NER = "ner";

// Motor sem modelo: a extração de cidades fica só com os padrões determinísticos
export class MotorNerVazio implements MotorNer {
    readonly nome = "nenhum";

    async analisar(_texto: string): Promise<TrechoEntidade[]> {
        return [];
    }
}

/**
 * Localiza cada ocorrência das superfícies no texto, respeitando limites de
 * palavra. Usado por motores que devolvem só o texto das entidades.
 */
export function localizarEntidades(
    texto: string,
    entidades: Array<{ texto: string; rotulo: RotuloEntidade }>,
    confianca: number,
    metodo: string
): TrechoEntidade[] {
    const trechos: TrechoEntidade[] = [];
    const vistos = new Set<string>();

    for (const entidade of entidades) {
        const superficie = entidade.texto.trim();
        const chave = `${entidade.rotulo}:${superficie}`;
        if (!superficie || vistos.has(chave)) continue;
        vistos.add(chave);

        let inicio = texto.indexOf(superficie);
        while (inicio !== -1) {
            const fim = inicio + superficie.length;
            const antes = texto[inicio - 1] ?? "";
            const depois = texto[fim] ?? "";

            if (!/[\p{L}\p{N}]/u.test(antes) && !/[\p{L}\p{N}]/u.test(depois)) {
                trechos.push({ texto: superficie, rotulo: entidade.rotulo, inicio, fim, confianca, metodo });
            }
            inicio = texto.indexOf(superficie, inicio + 1);
        }
    }

    return trechos.sort((a, b) => a.inicio - b.inicio || b.fim - a.fim);
}

// Rótulos aceitos na resposta de motores externos
export const ROTULOS_EXTERNOS: Record<string, RotuloEntidade> = {
    PERSON: RotuloEntidade.Pessoa,
    PER: RotuloEntidade.Pessoa,
    PESSOA: RotuloEntidade.Pessoa,
    LOCATION: RotuloEntidade.Local,
    LOC: RotuloEntidade.Local,
    GPE: RotuloEntidade.Local,
    CITY: RotuloEntidade.Local,
    LOCAL: RotuloEntidade.Local,
    CIDADE: RotuloEntidade.Local,
};
