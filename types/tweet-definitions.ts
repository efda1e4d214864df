/**
 * 统一的 Tweet 类型定义
 * Canonical record produced by the normalizer; every sink consumes this shape.
 */

/**
 * Raw upstream payload. Field names vary between client versions, so the
 * normalizer reads it through ordered accessors.
 */
export type RawTweetPayload = Record<string, unknown>;

export interface Tweet {
    /** 推文唯一 ID (去重键) */
    id: string;

    /** 发布时间，`YYYY-MM-DD HH:mm:ss` (UTC)；无法解析时为原始字符串 */
    date: string;

    /** 解析后的时间；无法解析时为 null */
    parsedDate: Date | null;

    /** 用户名 (不含 @) */
    username: string;

    /** 用户显示名称 */
    displayName: string;

    /** 推文文本内容 (换行已替换为空格) */
    text: string;

    retweets: number;
    likes: number;
    replies: number;
    quotes: number;
    views: number;

    /** 推文 URL */
    url: string;

    /** 原始数据 */
    raw: unknown;
}

export type ExportCell = string | number;

/**
 * Row order matches EXPORT_COLUMNS.
 */
export function toExportRow(tweet: Tweet): ExportCell[] {
    return [
        tweet.date,
        tweet.username,
        tweet.displayName,
        tweet.text,
        tweet.retweets,
        tweet.likes,
        tweet.replies,
        tweet.quotes,
        tweet.views,
        tweet.id,
        tweet.url,
    ];
}
