import type { SnapshotDiffer } from "@/pipeline/snapshotDiffer";
import type { FlightEvent } from "@/types";

export type TransportKind = "poll" | "push";

/**
 * 上流フィード 1 本分の取り込みアダプター。
 * stream は signal が中断されるまで終わらない遅延シーケンスで、再利用はできません。
 */
export interface IngestionAdapter {
  readonly name: string;
  readonly transport: TransportKind;
  /** 個々のイベントが独立した発生で、重複キャッシュを通す必要があるか */
  readonly requiresDeduplication: boolean;
  stream: (signal: AbortSignal) => AsyncGenerator<FlightEvent, void, undefined>;
}

/** コーディネーターが所有し、アダプターへ受け渡す共有状態 */
export interface IngestionState {
  snapshotDiffer: SnapshotDiffer;
}

export type AdapterFactory = (state: IngestionState) => IngestionAdapter;
