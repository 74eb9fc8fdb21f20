import type { ArbiterOutcome, DataProducers, DataSourceKind, TriggerCounts, TriggerState } from './types';

const BRANCHES: { source: DataSourceKind; counter: keyof TriggerCounts }[] = [
    { source: 'normal', counter: 'generatorA' },
    { source: 'poisson', counter: 'generatorB' },
    { source: 'file', counter: 'fileLoad' },
];

export const initialTriggerState = (counts: TriggerCounts): TriggerState => ({ ...counts });

/**
 * Decides which single source fired since `previous` and produces its dataset.
 * Branches are checked in order (normal, Poisson, file) and only the first
 * changed counter is consumed; any other changed counter is left for a later
 * call. The producer runs before the state moves, so a throwing producer
 * leaves `previous` untouched.
 */
export function arbitrate(observed: TriggerCounts, previous: TriggerState, producers: DataProducers): ArbiterOutcome {
    console.debug(`[arbiter] observed normal=${observed.generatorA} poisson=${observed.generatorB} file=${observed.fileLoad}`);

    for (const { source, counter } of BRANCHES) {
        if (observed[counter] !== previous[counter]) {
            console.debug(`[arbiter] ${counter} changed, using ${source}`);
            const dataset = producers[source]();
            return {
                source,
                dataset,
                state: { ...previous, [counter]: observed[counter] },
            };
        }
    }

    console.debug('[arbiter] nothing changed');
    return { source: null, dataset: null, state: previous };
}
