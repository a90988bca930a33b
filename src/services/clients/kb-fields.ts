import kbFields from '../../data/kb-fields.json';

/** Knowledge-base field names that interrogation fills in, sorted. */
export function listKbFields(): string[] {
    return [...kbFields].sort();
}
