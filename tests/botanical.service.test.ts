// ============================================
// MELIAPP - Botanical Service Tests
// ============================================

import { describe, it, expect } from 'vitest';
import { BotanicalService, buildBotanicalIndex } from '../src/services/botanical.service.js';
import { NotFoundError } from '../src/plugins/error-handler.plugin.js';

const CSV_PATH = './data/botanical-classes.csv';

describe('buildBotanicalIndex', () => {
  it('should strip a byte order mark and trim fields', () => {
    const index = buildBotanicalIndex('\uFEFFComuna;Clase;Nombre Comun\n Lebu ; Arbol ; Canelo \n');
    expect([...index.keys()]).toEqual(['Lebu']);
    expect(index.get('Lebu')?.get('Arbol')).toEqual(['Canelo']);
  });

  it('should skip rows with a missing field', () => {
    const index = buildBotanicalIndex('Comuna;Clase;Nombre Comun\nLebu;;Canelo\n;Arbol;Boldo\nLebu;Hierba;\n');
    expect(index.size).toBe(0);
  });
});

describe('BotanicalService', () => {
  const service = new BotanicalService(CSV_PATH);

  it('should list communes in Spanish alphabetical order', async () => {
    expect(await service.listCommunes()).toEqual([
      'Chillán',
      'Curicó',
      'Los Ángeles',
      'Pucón',
      'Talca',
      'Temuco',
      'Valdivia',
    ]);
  });

  it('should group species by class in first-seen order without duplicates', async () => {
    const classes = await service.getClasses('Chillán');

    expect(classes.map(c => c.clase)).toEqual(['Arbol', 'Arbusto', 'Hierba', 'Arbusto/Hierba']);
    expect(classes[0].especies).toEqual(['Quillay', 'Peumo']);
    expect(classes[0].cantidad).toBe(2);
    expect(classes[2].especies).toEqual(['Trébol Blanco', 'Diente de León']);
  });

  it('should attach class metadata', async () => {
    const [arbol] = await service.getClasses('Chillán');

    expect(arbol).toMatchObject({
      clase: 'Arbol',
      titulo: 'Árboles',
      icono: '🌳',
      color: '#22c55e',
      categoria: 'Leñosa',
      altura: 'Mayor a 5 metros',
    });
  });

  it('should give unknown classes the neutral default', async () => {
    const classes = await service.getClasses('Pucón');
    const trepadora = classes.find(c => c.clase === 'Trepadora');

    expect(trepadora).toMatchObject({
      titulo: 'Trepadora',
      categoria: 'Otra',
      color: '#6b7280',
      especies: ['Voqui'],
    });
  });

  it('should trim the requested commune', async () => {
    const classes = await service.getClasses('  Talca ');
    expect(classes).toHaveLength(4);
  });

  it('should reject unknown communes with the available list', async () => {
    const error = await service.getClasses('Atlantis').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(NotFoundError);
    expect(error).toMatchObject({
      message: 'Comuna no registrada: Atlantis',
      statusCode: 404,
      details: {
        requested_comuna: 'Atlantis',
        available_communes: expect.arrayContaining(['Chillán', 'Pucón']),
      },
    });
  });

  it('should return every species of a commune', async () => {
    expect(await service.getSpecies('Pucón')).toEqual(['Ulmo', 'Tineo', 'Avellano', 'Trébol Rojo', 'Voqui']);
    expect(await service.getSpecies('Atlantis')).toEqual([]);
  });
});
