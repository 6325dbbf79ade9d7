import {
    StatusResolucao,
    type CidadeMencionada,
    type OcorrenciaCidade,
    type ResumoCidadesArtigo,
} from "../types/index.js";

// Mais ocorrências; empate: maior confiança; depois menor código IBGE
function compararPrincipal(a: CidadeMencionada, b: CidadeMencionada): number {
    if (a.ocorrencias !== b.ocorrencias) return b.ocorrencias - a.ocorrencias;
    if (a.confianca !== b.confianca) return b.confianca - a.confianca;

    const idA = Number(a.cidadeId);
    const idB = Number(b.cidadeId);
    if (Number.isFinite(idA) && Number.isFinite(idB) && idA !== idB) return idA - idB;
    return a.cidadeId < b.cidadeId ? -1 : a.cidadeId > b.cidadeId ? 1 : 0;
}

/**
 * Consolida as ocorrências resolvidas de um artigo por cidade, na ordem em
 * que aparecem, e escolhe a cidade principal.
 */
export function agregarCidades(ocorrencias: OcorrenciaCidade[]): ResumoCidadesArtigo {
    const porCidade = new Map<string, CidadeMencionada>();

    for (const ocorrencia of ocorrencias) {
        if (ocorrencia.status !== StatusResolucao.Resolvida || !ocorrencia.cidadeId) continue;

        const candidato = ocorrencia.candidatos.find((c) => c.cidadeId === ocorrencia.cidadeId);
        const existente = porCidade.get(ocorrencia.cidadeId);

        if (!existente) {
            porCidade.set(ocorrencia.cidadeId, {
                cidadeId: ocorrencia.cidadeId,
                nome: candidato?.nome ?? ocorrencia.superficie,
                uf: candidato?.uf ?? ocorrencia.ufHint ?? "",
                ocorrencias: 1,
                confianca: ocorrencia.confianca,
                metodos: [ocorrencia.metodo],
            });
            continue;
        }

        existente.ocorrencias += 1;
        existente.confianca = Math.max(existente.confianca, ocorrencia.confianca);
        if (!existente.metodos.includes(ocorrencia.metodo)) {
            existente.metodos.push(ocorrencia.metodo);
        }
    }

    const cidades = [...porCidade.values()];
    const principal = cidades.length > 0 ? [...cidades].sort(compararPrincipal)[0] : null;

    return { principal, cidades };
}
