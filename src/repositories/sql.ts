import { z } from 'zod';

export interface Paged<T> {
    items: T[];
    total: number;
}

// pg hands back NUMERIC/COUNT as string and TIMESTAMPTZ as Date.
export const numeric = z.union([z.number(), z.string()]).transform(Number);
export const nullableNumeric = z.union([z.number(), z.string()]).nullable().transform(v => (v === null ? null : Number(v)));
export const timestamp = z.union([z.date(), z.string()]).transform(v => new Date(v).toISOString());
export const nullableTimestamp = z.union([z.date(), z.string()]).nullable()
    .transform(v => (v === null ? null : new Date(v).toISOString()));

const countRowSchema = z.object({ total: numeric });

export const readCount = (rows: unknown[]): number => (rows.length > 0 ? countRowSchema.parse(rows[0]).total : 0);

/**
 * Accumulates `AND`-joined conditions with positional parameters.
 */
export class WhereBuilder {
    private readonly conditions: string[] = [];
    readonly params: unknown[] = [];

    add(condition: string, ...values: unknown[]): this {
        let text = condition;
        for (const value of values) {
            this.params.push(value);
            text = text.replace('?', `$${this.params.length}`);
        }
        this.conditions.push(text);
        return this;
    }

    addIf(when: boolean, condition: string, ...values: unknown[]): this {
        return when ? this.add(condition, ...values) : this;
    }

    next(value: unknown): string {
        this.params.push(value);
        return `$${this.params.length}`;
    }

    toSql(): string {
        return this.conditions.length > 0 ? `WHERE ${this.conditions.join(' AND ')}` : '';
    }
}
