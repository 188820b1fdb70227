// src/utils/ProgressManager/IProgressManager.ts

/**
 * プログレスバーのペイロード（表示テキスト）
 * RealProgressManager の format 文字列 '{status}' に対応
 */
export interface ProgressPayload {
	status?: string;
}

/**
 * 個々のプログレスバー（SingleBar）を抽象化するインターフェース
 */
export interface IProgressBar {
	/**
	 * 進捗をインクリメントします。
	 * @param value インクリメントする量 (デフォルト: 1)
	 */
	increment(value?: number, payload?: ProgressPayload): void;

	/**
	 * 進捗は変更せず、ペイロードのみを更新します。
	 */
	updatePayload(payload: ProgressPayload): void;
}

/**
 * プログレスバーUI（MultiBar）全体を管理するインターフェース
 */
export interface IProgressManager {
	start(): void;

	/**
	 * 描画を停止します。複数回呼び出しても安全です。
	 */
	stop(): void;

	addBar(name: string, total: number, startValue?: number, payload?: ProgressPayload): IProgressBar;

	removeBar(bar: IProgressBar): void;
}
