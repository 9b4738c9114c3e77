import { OffsetPage, Page } from '../types';

export function toPage<T>(items: T[], total: number, page: number, pageSize: number): Page<T> {
    return {
        items,
        total_count: total,
        page,
        page_size: pageSize,
        has_more: page * pageSize < total,
    };
}

export function toOffsetPage<T>(items: T[], total: number, limit: number, offset: number): OffsetPage<T> {
    return {
        items,
        total_count: total,
        limit,
        offset,
        has_more: offset + items.length < total,
    };
}
