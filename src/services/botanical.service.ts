// ============================================
// MELIAPP - Botanical Classification Service
// ============================================

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import Papa from 'papaparse';
import { env } from '../config/env.js';
import { NotFoundError } from '../plugins/error-handler.plugin.js';
import type { BotanicalCategory, BotanicalClassView } from '../types/index.js';

interface ClassStyle {
  titulo: string;
  icono: string;
  color: string;
  descripcion: string;
  categoria: BotanicalCategory;
  altura: string;
}

const CLASS_STYLES: Record<string, ClassStyle> = {
  'Arbol': {
    titulo: 'Árboles',
    icono: '🌳',
    color: '#22c55e',
    descripcion: 'Plantas leñosas perennes de gran tamaño',
    categoria: 'Leñosa',
    altura: 'Mayor a 5 metros',
  },
  'Arbol/Arbusto': {
    titulo: 'Árboles/Arbustos',
    icono: '🌲',
    color: '#16a34a',
    descripcion: 'Plantas leñosas de tamaño variable',
    categoria: 'Leñosa Mixta',
    altura: '2-5 metros',
  },
  'Arbusto': {
    titulo: 'Arbustos',
    icono: '🌿',
    color: '#84cc16',
    descripcion: 'Plantas leñosas de tamaño mediano',
    categoria: 'Leñosa',
    altura: '1-2 metros',
  },
  'Hierba': {
    titulo: 'Hierbas',
    icono: '🌱',
    color: '#65a30d',
    descripcion: 'Plantas herbáceas sin estructura leñosa',
    categoria: 'Herbácea',
    altura: 'Menor a 1 metro',
  },
  'Arbusto/Hierba': {
    titulo: 'Arbustos/Hierbas',
    icono: '🌾',
    color: '#a3a3a3',
    descripcion: 'Plantas con características mixtas',
    categoria: 'Mixta',
    altura: 'Variable',
  },
  'Arbol/Hierba': {
    titulo: 'Árboles/Hierbas',
    icono: '🌴',
    color: '#10b981',
    descripcion: 'Combinación de características arbóreas y herbáceas',
    categoria: 'Mixta',
    altura: 'Variable',
  },
};

function styleFor(clase: string): ClassStyle {
  return CLASS_STYLES[clase] ?? {
    titulo: clase,
    icono: '🌿',
    color: '#6b7280',
    descripcion: 'Clase botánica',
    categoria: 'Otra',
    altura: 'Variable',
  };
}

// comuna -> clase -> species, all in first-seen order
type BotanicalIndex = Map<string, Map<string, string[]>>;

interface CsvRow {
  'Comuna'?: string;
  'Clase'?: string;
  'Nombre Comun'?: string;
}

export function buildBotanicalIndex(csvText: string): BotanicalIndex {
  const parsed = Papa.parse<CsvRow>(csvText.replace(/^\uFEFF/, ''), {
    header: true,
    delimiter: ';',
    skipEmptyLines: true,
    transformHeader: (header) => header.trim(),
  });

  const index: BotanicalIndex = new Map();
  for (const row of parsed.data) {
    const comuna = row['Comuna']?.trim();
    const clase = row['Clase']?.trim();
    const especie = row['Nombre Comun']?.trim();
    if (!comuna || !clase || !especie) continue;

    let classes = index.get(comuna);
    if (!classes) {
      classes = new Map();
      index.set(comuna, classes);
    }
    let species = classes.get(clase);
    if (!species) {
      species = [];
      classes.set(clase, species);
    }
    if (!species.includes(especie)) {
      species.push(especie);
    }
  }
  return index;
}

/**
 * Read-only lookup over the bundled reference table. The table is read on
 * first use and kept for the life of the process.
 */
export class BotanicalService {
  private index: Promise<BotanicalIndex> | null = null;

  constructor(private csvPath: string = env.BOTANICAL_CSV_PATH) {}

  async listCommunes(): Promise<string[]> {
    const index = await this.loadIndex();
    return [...index.keys()].sort((a, b) => a.localeCompare(b, 'es'));
  }

  async getClasses(comuna: string): Promise<BotanicalClassView[]> {
    const requested = comuna.trim();
    const index = await this.loadIndex();
    const classes = index.get(requested);

    if (!classes) {
      throw new NotFoundError(`Comuna no registrada: ${requested}`, {
        available_communes: await this.listCommunes(),
        requested_comuna: requested,
      });
    }

    return [...classes.entries()].map(([clase, especies]) => ({
      clase,
      ...styleFor(clase),
      especies: [...especies],
      cantidad: especies.length,
    }));
  }

  /**
   * Every species recorded for the municipality, or an empty list when the
   * municipality is not in the table.
   */
  async getSpecies(comuna: string): Promise<string[]> {
    const index = await this.loadIndex();
    const classes = index.get(comuna.trim());
    if (!classes) return [];

    const all = new Set<string>();
    for (const especies of classes.values()) {
      for (const especie of especies) all.add(especie);
    }
    return [...all];
  }

  private loadIndex(): Promise<BotanicalIndex> {
    if (!this.index) {
      const file = path.resolve(process.cwd(), this.csvPath);
      this.index = readFile(file, 'utf-8')
        .then(buildBotanicalIndex)
        .catch((err: unknown) => {
          this.index = null;
          throw err;
        });
    }
    return this.index;
  }
}
