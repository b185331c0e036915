/**
 * 環境変数
 */
declare namespace NodeJS {
  interface ProcessEnv {
    readonly NODE_ENV?: string;
    readonly BOOK_DATA_FILE?: string;
    readonly BOOK_CSV_FILE?: string;
    readonly LOG_LEVEL?: string;
    readonly WEB_HOST?: string;
    readonly WEB_PORT?: string;
  }
}
