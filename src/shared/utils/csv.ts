// ============================================================================
// RUTA: src/shared/utils/csv.ts
// ============================================================================

/**
 * Convierte texto CSV en filas de celdas. Admite comillas dobles (con `""` como escape),
 * saltos de línea dentro de celdas entrecomilladas, CRLF y BOM inicial. Omite filas vacías.
 */
export const parseCsv = (text: string): string[][] => {
  const input = text.startsWith('\uFEFF') ? text.slice(1) : text;
  const rows: string[][] = [];
  let row: string[] = [];
  let cell = '';
  let inQuotes = false;

  const pushRow = () => {
    row.push(cell);
    if (row.some((value) => value.trim().length > 0)) {
      rows.push(row);
    }
    row = [];
    cell = '';
  };

  for (let index = 0; index < input.length; index += 1) {
    const char = input[index];

    if (inQuotes) {
      if (char === '"') {
        if (input[index + 1] === '"') {
          cell += '"';
          index += 1;
        } else {
          inQuotes = false;
        }
      } else {
        cell += char;
      }
      continue;
    }

    if (char === '"') {
      inQuotes = true;
    } else if (char === ',') {
      row.push(cell);
      cell = '';
    } else if (char === '\n') {
      pushRow();
    } else if (char === '\r') {
      if (input[index + 1] !== '\n') {
        pushRow();
      }
    } else {
      cell += char;
    }
  }

  if (cell.length > 0 || row.length > 0) {
    pushRow();
  }

  return rows;
};
