import { JetOrdering, Period, UncertaintyScale } from "../analysis_types.js";
import { attempt, EventViewErrorCode, invalidConfiguration } from "../errors/event_view_error.js";
import { isValidPair, JetPair } from "../event/jet_pair.js";
import { RawEventRecord } from "../event/raw_event_record.js";
import { KinFitProducer } from "../kinfit/kinfit_types.js";
import { SummaryInfo } from "../summary/summary_info.js";
import { AppliedShift, EventView, formatEventId } from "../view/event_view.js";

export interface ReplayContext {
    readonly period: Period;
    readonly jet_ordering: JetOrdering;
    readonly hypothesis_index: number;
    readonly summary?: SummaryInfo;
    readonly kinfit_producer?: KinFitProducer;
    /** Build every view under this jet-energy shift instead of nominal */
    readonly shift?: AppliedShift;
}

export interface EventSummary {
    readonly event_id: string;
    readonly n_jets: number;
    readonly n_b_tagged: number;
    readonly b_jet_pair: readonly [number, number] | null;
    readonly vbf_jet_pair: readonly [number, number] | null;
    readonly ht: number | null;
    readonly m_bb: number | null;
    readonly error_code: EventViewErrorCode | null;
}

export interface ReplayMetrics {
    events: number;
    with_b_jet_pair: number;
    with_vbf_jet_pair: number;
    errors_by_code: Partial<Record<EventViewErrorCode, number>>;
}

function pairOrNull(pair: JetPair, n_jets: number): readonly [number, number] | null {
    return isValidPair(pair, n_jets) ? [pair.first, pair.second] : null;
}

function summarize(view: EventView): EventSummary {
    const selected = view.getSelectedSignalJets();
    const n_jets = view.getNJets();
    return {
        event_id: formatEventId(view.getEventId()),
        n_jets,
        n_b_tagged: selected.n_b_tagged,
        b_jet_pair: pairOrNull(selected.b_jet_pair, n_jets),
        vbf_jet_pair: pairOrNull(selected.vbf_jet_pair, n_jets),
        ht: view.getHT(),
        m_bb: view.hasBjetPair() ? view.getHiggsBB().getMomentum().mass() : null,
        error_code: null,
    };
}

function failed(record: RawEventRecord, code: EventViewErrorCode): EventSummary {
    return {
        event_id: formatEventId(record),
        n_jets: record.jets.length,
        n_b_tagged: 0,
        b_jet_pair: null,
        vbf_jet_pair: null,
        ht: null,
        m_bb: null,
        error_code: code,
    };
}

/**
 * Drives a batch of flat records through EventView construction.
 * Per-event failures are reported in that event's summary and counted.
 */
export function runEventReplay(
    records: readonly RawEventRecord[],
    context: ReplayContext
): { summaries: EventSummary[]; metrics: ReplayMetrics } {
    const summaries: EventSummary[] = [];
    const metrics: ReplayMetrics = { events: 0, with_b_jet_pair: 0, with_vbf_jet_pair: 0, errors_by_code: {} };

    console.log(`[EVENT_REPLAY] Starting replay for ${records.length} events...`);

    for (const record of records) {
        metrics.events++;

        const result = attempt(() => {
            const nominal = new EventView({
                event: record,
                hypothesis_index: context.hypothesis_index,
                period: context.period,
                jet_ordering: context.jet_ordering,
                summary: context.summary,
                kinfit_producer: context.kinfit_producer,
            });
            const view = context.shift
                ? nominal.applyShift(context.shift.source, context.shift.scale)
                : nominal;
            return summarize(view);
        });

        if (!result.ok) {
            const code = result.error.code;
            metrics.errors_by_code[code] = (metrics.errors_by_code[code] ?? 0) + 1;
            console.warn(`[EVENT_REPLAY] ${formatEventId(record)} failed: ${code} ${result.error.message}`);
            summaries.push(failed(record, code));
            continue;
        }

        if (result.value.b_jet_pair) metrics.with_b_jet_pair++;
        if (result.value.vbf_jet_pair) metrics.with_vbf_jet_pair++;
        summaries.push(result.value);
    }

    console.log(`[EVENT_REPLAY] Replay complete.`);
    return { summaries, metrics };
}

/** Parse `--shift <source>:<up|down>` from command-line arguments. */
export function parseShiftArgument(argv: readonly string[]): AppliedShift | undefined {
    const at = argv.indexOf("--shift");
    if (at < 0) return undefined;
    const value = argv[at + 1] ?? "";
    const [source, direction] = value.split(":");
    if (!source || (direction !== "up" && direction !== "down")) {
        throw invalidConfiguration(`Invalid --shift "${value}", expected <source>:<up|down>.`, { value });
    }
    return { source, scale: direction === "up" ? UncertaintyScale.Up : UncertaintyScale.Down };
}
