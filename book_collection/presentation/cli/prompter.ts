import { createInterface } from "node:readline/promises";

/**
 * 対話入出力のポート
 * テストでは台本どおりに入力を返す実装に差し替える
 */
export interface Prompter {
  /**
   * 質問を表示して1行読む
   * @returns 入力が終端に達した場合は null
   */
  ask(question: string): Promise<string | null>;
  print(text?: string): void;
  close(): void;
}

/**
 * readline による標準入出力の実装
 */
export function createReadlinePrompter(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): Prompter {
  const rl = createInterface({ input, output });

  let closed = false;
  const whenClosed = new Promise<null>((resolve) => {
    rl.once("close", () => {
      closed = true;
      resolve(null);
    });
  });

  return {
    async ask(question: string): Promise<string | null> {
      if (closed) return null;
      // 入力が閉じられても question は解決されないことがあるため close と競争させる
      return Promise.race([rl.question(question), whenClosed]);
    },
    print(text = ""): void {
      output.write(`${text}\n`);
    },
    close(): void {
      rl.close();
    }
  };
}
