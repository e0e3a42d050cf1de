// services/orchestrator/src/core/registry/csv.ts

/**
 * Split CSV text into rows of fields. Handles quoted fields, doubled quotes
 * inside quotes, and CRLF/LF line endings. Blank lines are returned as
 * empty rows so callers can report line numbers.
 */
export function parseCsv(text: string): string[][] {
    const rows: string[][] = []
    let row: string[] = []
    let field = ''
    let quoted = false
    let i = 0

    const endRow = () => {
        row.push(field)
        rows.push(row.length === 1 && row[0] === '' ? [] : row)
        row = []
        field = ''
    }

    while (i < text.length) {
        const c = text[i]

        if (quoted) {
            if (c === '"') {
                if (text[i + 1] === '"') {
                    field += '"'
                    i += 2
                    continue
                }
                quoted = false
                i++
                continue
            }
            field += c
            i++
            continue
        }

        if (c === '"' && field.length === 0) {
            quoted = true
            i++
        } else if (c === ',') {
            row.push(field)
            field = ''
            i++
        } else if (c === '\r' && text[i + 1] === '\n') {
            endRow()
            i += 2
        } else if (c === '\n' || c === '\r') {
            endRow()
            i++
        } else {
            field += c
            i++
        }
    }

    // trailing line without newline
    if (field.length > 0 || row.length > 0 || quoted) endRow()

    return rows
}

function quoteField(v: string): string {
    return /[",\r\n]/.test(v) ? `"${v.replace(/"/g, '""')}"` : v
}

export function formatCsv(rows: readonly (readonly string[])[]): string {
    return rows.map(r => r.map(quoteField).join(',')).join('\r\n') + (rows.length ? '\r\n' : '')
}
