import fs from 'fs';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createTempCatalog, type TempCatalog } from '../../test-utils/temp-catalog';
import { DuplicateSkuError } from './products.errors';

describe('ProductCatalog', () => {
  let ctx: TempCatalog;

  beforeEach(() => {
    ctx = createTempCatalog();
  });

  afterEach(() => {
    vi.useRealTimers();
    ctx.cleanup();
  });

  describe('initialize', () => {
    it('creates the database file and its directory', () => {
      expect(fs.existsSync(ctx.dbPath)).toBe(true);
      expect(path.basename(path.dirname(ctx.dbPath))).toBe('nested');
    });

    it('can run again without touching existing rows', () => {
      ctx.catalog.add({ sku: 'KEEP-1', name: 'Keeper', category: 'Misc', price: 1 });
      ctx.catalog.initialize();
      expect(ctx.catalog.list().map(p => p.sku)).toEqual(['KEEP-1']);
    });
  });

  describe('add', () => {
    it('upper-cases the sku and fills in defaults', () => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(new Date('2026-03-01T09:00:00.000Z'));

      const product = ctx.catalog.add({ sku: 'wid-001', name: 'Widget', category: 'Tools', price: 19.99 });

      expect(product).toEqual({
        id: 1,
        sku: 'WID-001',
        name: 'Widget',
        category: 'Tools',
        price: 19.99,
        cost: 0,
        inventory: 0,
        unit: 'ea',
        description: '',
        active: true,
        created_at: '2026-03-01T09:00:00.000Z',
        updated_at: '2026-03-01T09:00:00.000Z',
      });
    });

    it('stores every field so list and search read back the same product', () => {
      const created = ctx.catalog.add({
        sku: 'bx-10',
        name: 'Box of screws',
        category: 'Hardware',
        price: 4.5,
        cost: 1.25,
        inventory: 42,
        unit: 'box',
        description: 'Stainless, 100 count',
      });

      expect(ctx.catalog.list()).toEqual([created]);
      expect(ctx.catalog.search('screws')).toEqual([created]);
    });

    it('assigns increasing ids', () => {
      const first = ctx.catalog.add({ sku: 'A-1', name: 'A', category: 'X', price: 1 });
      const second = ctx.catalog.add({ sku: 'A-2', name: 'B', category: 'X', price: 1 });
      expect(second.id).toBe(first.id + 1);
    });

    it('rejects a sku that differs only in case', () => {
      ctx.catalog.add({ sku: 'abc-1', name: 'Original', category: 'X', price: 1 });

      expect(() => ctx.catalog.add({ sku: 'ABC-1', name: 'Copy', category: 'X', price: 2 })).toThrow(
        DuplicateSkuError
      );
      expect(ctx.catalog.list({ activeOnly: false }).map(p => p.name)).toEqual(['Original']);
    });

    it('reports the normalized sku on the duplicate error', () => {
      ctx.catalog.add({ sku: 'dup', name: 'One', category: 'X', price: 1 });
      try {
        ctx.catalog.add({ sku: 'Dup', name: 'Two', category: 'X', price: 1 });
        expect.unreachable('duplicate insert should throw');
      } catch (error) {
        expect(error).toBeInstanceOf(DuplicateSkuError);
        expect(error).toMatchObject({ sku: 'DUP', code: 'DUPLICATE_SKU', message: "SKU 'DUP' already exists" });
      }
    });
  });

  describe('list', () => {
    beforeEach(() => {
      ctx.catalog.add({ sku: 'T-2', name: 'Wrench', category: 'Tools', price: 12 });
      ctx.catalog.add({ sku: 'P-1', name: 'Washer', category: 'Parts', price: 0.1 });
      ctx.catalog.add({ sku: 'T-1', name: 'Hammer', category: 'Tools', price: 15 });
      ctx.catalog.add({ sku: 'P-2', name: 'Bolt', category: 'Parts', price: 0.3 });
    });

    it('orders by category then name', () => {
      expect(ctx.catalog.list().map(p => p.sku)).toEqual(['P-2', 'P-1', 'T-1', 'T-2']);
    });

    it('filters on the exact category', () => {
      expect(ctx.catalog.list({ category: 'Tools' }).map(p => p.name)).toEqual(['Hammer', 'Wrench']);
      expect(ctx.catalog.list({ category: 'tools' })).toEqual([]);
    });

    it('caps the number of rows', () => {
      expect(ctx.catalog.list({ limit: 2 }).map(p => p.sku)).toEqual(['P-2', 'P-1']);
    });

    it('hides inactive products unless asked for them', () => {
      ctx.deactivate('P-1');

      expect(ctx.catalog.list().map(p => p.sku)).toEqual(['P-2', 'T-1', 'T-2']);

      const all = ctx.catalog.list({ activeOnly: false });
      expect(all.map(p => p.sku)).toEqual(['P-2', 'P-1', 'T-1', 'T-2']);
      expect(all[1].active).toBe(false);
    });

    it('returns an empty array when nothing matches', () => {
      expect(ctx.catalog.list({ category: 'Nope' })).toEqual([]);
    });
  });

  it('caps list at 50 rows by default while export writes every product', () => {
    for (let i = 1; i <= 60; i++) {
      ctx.catalog.add({ sku: `BULK-${String(i).padStart(2, '0')}`, name: `Item ${i}`, category: 'Bulk', price: 1 });
    }

    expect(ctx.catalog.list()).toHaveLength(50);

    const lines = ctx.catalog.exportCsv().split('\r\n');
    // header, 60 rows, then the empty string after the trailing CRLF
    expect(lines).toHaveLength(62);
    expect(lines[61]).toBe('');
    expect(lines.slice(1, 61).every(line => line.startsWith('BULK-'))).toBe(true);
  });

  describe('search', () => {
    beforeEach(() => {
      ctx.catalog.add({ sku: 'TL-1', name: 'Widget', category: 'Tools', price: 5 });
      ctx.catalog.add({ sku: 'TL-2', name: 'Gizmo', category: 'Widgets', price: 6 });
      ctx.catalog.add({ sku: 'TL-3', name: 'Gadget', category: 'Tools', price: 7 });
    });

    it('matches name or category case-insensitively, ordered by name', () => {
      expect(ctx.catalog.search('wid').map(p => p.name)).toEqual(['Gizmo', 'Widget']);
    });

    it('matches sku and description', () => {
      ctx.catalog.add({ sku: 'ZZ-9', name: 'Spare', category: 'Misc', price: 1, description: 'fits the gadget' });

      expect(ctx.catalog.search('tl-3').map(p => p.sku)).toEqual(['TL-3']);
      expect(ctx.catalog.search('GADGET').map(p => p.sku)).toEqual(['TL-3', 'ZZ-9']);
    });

    it('treats an empty query as match-all, inactive products included', () => {
      ctx.deactivate('TL-1');
      expect(ctx.catalog.search('').map(p => p.name)).toEqual(['Gadget', 'Gizmo', 'Widget']);
    });

    it('matches LIKE wildcards literally', () => {
      ctx.catalog.add({ sku: 'CT-1', name: '100% Cotton', category: 'Textiles', price: 9 });
      ctx.catalog.add({ sku: 'CT_2', name: 'Linen', category: 'Textiles', price: 9 });

      expect(ctx.catalog.search('%').map(p => p.sku)).toEqual(['CT-1']);
      expect(ctx.catalog.search('_').map(p => p.sku)).toEqual(['CT_2']);
    });
  });

  describe('adjustInventory', () => {
    it('adds and removes stock', () => {
      ctx.catalog.add({ sku: 'INV-1', name: 'Thing', category: 'X', price: 1, inventory: 5 });

      expect(ctx.catalog.adjustInventory('INV-1', 7)?.inventory).toBe(12);
      expect(ctx.catalog.adjustInventory('INV-1', -2)?.inventory).toBe(10);
    });

    it('clamps at zero instead of going negative', () => {
      ctx.catalog.add({ sku: 'INV-1', name: 'Thing', category: 'X', price: 1, inventory: 5 });

      const product = ctx.catalog.adjustInventory('INV-1', -100);

      expect(product?.inventory).toBe(0);
      expect(ctx.catalog.list()[0].inventory).toBe(0);
    });

    it('looks the sku up case-insensitively', () => {
      ctx.catalog.add({ sku: 'INV-1', name: 'Thing', category: 'X', price: 1 });
      expect(ctx.catalog.adjustInventory('inv-1', 3)?.sku).toBe('INV-1');
    });

    it('refreshes updated_at and keeps created_at', () => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(new Date('2026-01-01T00:00:00.000Z'));
      ctx.catalog.add({ sku: 'INV-1', name: 'Thing', category: 'X', price: 1 });

      vi.setSystemTime(new Date('2026-01-02T00:00:00.000Z'));
      const product = ctx.catalog.adjustInventory('INV-1', 1);

      expect(product?.created_at).toBe('2026-01-01T00:00:00.000Z');
      expect(product?.updated_at).toBe('2026-01-02T00:00:00.000Z');
    });

    it('returns null for an unknown sku and changes nothing', () => {
      ctx.catalog.add({ sku: 'INV-1', name: 'Thing', category: 'X', price: 1, inventory: 4 });
      const before = ctx.catalog.list({ activeOnly: false });

      expect(ctx.catalog.adjustInventory('MISSING', 10)).toBeNull();
      expect(ctx.catalog.list({ activeOnly: false })).toEqual(before);
    });
  });

  describe('exportCsv', () => {
    const header = 'SKU,Name,Category,Price,Cost,Margin%,Inventory,Unit,Status,Active';

    it('writes every product once, inactive ones included', () => {
      ctx.catalog.add({ sku: 'b-2', name: 'Bolt', category: 'Hardware', price: 0.5, cost: 0.2, inventory: 100, unit: 'box' });
      ctx.catalog.add({
        sku: 'a-1',
        name: 'Anvil, Heavy',
        category: 'Forge',
        price: 120,
        cost: 80,
        inventory: 3,
        description: 'Cast iron',
      });
      ctx.deactivate('B-2');

      expect(ctx.catalog.exportCsv()).toBe(
        [
          header,
          'A-1,"Anvil, Heavy",Forge,120.00,80.00,33.3,3,ea,LOW_STOCK,True',
          'B-2,Bolt,Hardware,0.50,0.20,60.0,100,box,IN_STOCK,False',
          '',
        ].join('\r\n')
      );
    });

    it('writes only the header for an empty catalog', () => {
      expect(ctx.catalog.exportCsv()).toBe(`${header}\r\n`);
    });

    it('escapes embedded quotes', () => {
      ctx.catalog.add({ sku: 'Q-1', name: 'The "Big" One', category: 'Misc', price: 0 });

      const [, row] = ctx.catalog.exportCsv().split('\r\n');
      expect(row).toBe('Q-1,"The ""Big"" One",Misc,0.00,0.00,0.0,0,ea,OUT_OF_STOCK,True');
    });

    it('quotes fields with leading or trailing spaces', () => {
      ctx.catalog.add({ sku: 'SP-1', name: ' Spaced ', category: 'Misc', price: 1, inventory: 20 });

      const [, row] = ctx.catalog.exportCsv().split('\r\n');
      expect(row).toBe('SP-1," Spaced ",Misc,1.00,0.00,100.0,20,ea,IN_STOCK,True');
    });

    it('overwrites the output file and returns the same text', () => {
      const outputPath = path.join(ctx.dir, 'export.csv');
      fs.writeFileSync(outputPath, 'stale content that is longer than the export');
      ctx.catalog.add({ sku: 'E-1', name: 'Eraser', category: 'Office', price: 2, cost: 1, inventory: 10 });

      const csv = ctx.catalog.exportCsv(outputPath);

      expect(fs.readFileSync(outputPath, 'utf8')).toBe(csv);
      expect(csv).toBe(`${header}\r\nE-1,Eraser,Office,2.00,1.00,50.0,10,ea,IN_STOCK,True\r\n`);
    });
  });

  describe('stats', () => {
    it('is all zeros for an empty catalog', () => {
      expect(ctx.catalog.stats()).toEqual({
        total: 0,
        out_of_stock: 0,
        low_stock: 0,
        in_stock: 0,
        inventory_value: 0,
        categories: {},
      });
    });

    it('summarises active products only', () => {
      ctx.catalog.add({ sku: 'S-1', name: 'Empty', category: 'Tools', price: 2.5 });
      ctx.catalog.add({ sku: 'S-2', name: 'Few', category: 'Tools', price: 10, inventory: 5 });
      ctx.catalog.add({ sku: 'S-3', name: 'Many', category: 'Parts', price: 1.25, inventory: 20 });
      ctx.catalog.add({ sku: 'S-4', name: 'Retired', category: 'Parts', price: 100, inventory: 50 });
      ctx.deactivate('S-4');

      expect(ctx.catalog.stats()).toEqual({
        total: 3,
        out_of_stock: 1,
        low_stock: 1,
        in_stock: 1,
        inventory_value: 75,
        categories: { Tools: 2, Parts: 1 },
      });
    });

    it('rounds the inventory value to cents', () => {
      ctx.catalog.add({ sku: 'R-1', name: 'Rounding', category: 'X', price: 0.333, inventory: 3 });
      expect(ctx.catalog.stats().inventory_value).toBe(1);
    });
  });

  it('answers ping once initialized', () => {
    expect(ctx.catalog.ping()).toBe(true);
  });
});
