import fs from 'fs';
import path from 'path';
import { buildDraftItems, buildDraftPayload, loadStrategyCatalog, planStrategies } from '../../src/engine/strategies';
import { makeTempDir } from '../helpers/fixtures';

describe('draft strategies', () => {
    const catalog = loadStrategyCatalog();

    it('loads the bundled catalog in order', () => {
        expect(catalog.map(s => s.name)).toEqual([
            'supply_type_direct',
            'supply_type_crossdock',
            'type_direct',
            'type_crossdock',
            'both_direct',
            'both_crossdock',
            'legacy_enum_fbo',
            'legacy_enum_crossdock',
            'legacy_both_fbo',
            'legacy_both_crossdock',
        ]);
        expect(catalog.every(s => s.useDropOff === false)).toBe(true);
    });

    it('rejects a catalog file that does not validate', () => {
        const file = path.join(makeTempDir('catalog'), 'bad.json');
        fs.writeFileSync(file, JSON.stringify([{ name: 'x', kind: 'sideways' }]));
        expect(() => loadStrategyCatalog(file)).toThrow(/invalid draft strategy catalog/);
    });

    it('keeps catalog order without hints', () => {
        const planned = planStrategies(catalog, { preference: null, dropOffWarehouseId: null });
        expect(planned.map(s => s.name)).toEqual(catalog.map(s => s.name));
    });

    it('adds drop-off twins of the crossdock shapes', () => {
        const planned = planStrategies(catalog, { preference: null, dropOffWarehouseId: 77 });
        expect(planned).toHaveLength(15);
        expect(planned.slice(10).map(s => s.name)).toEqual([
            'supply_type_crossdock_drop',
            'type_crossdock_drop',
            'both_crossdock_drop',
            'legacy_enum_crossdock_drop',
            'legacy_both_crossdock_drop',
        ]);
        expect(planned.slice(10).every(s => s.useDropOff)).toBe(true);
    });

    it('moves the preferred kind to the front', () => {
        const planned = planStrategies(catalog, { preference: 'crossdock', dropOffWarehouseId: null });
        expect(planned.slice(0, 5).map(s => s.name)).toEqual([
            'supply_type_crossdock',
            'type_crossdock',
            'both_crossdock',
            'legacy_enum_crossdock',
            'legacy_both_crossdock',
        ]);
        expect(planned[5]?.name).toBe('supply_type_direct');
    });

    it('sends numeric product ids as numbers', () => {
        expect(
            buildDraftItems([
                { product_id: '1001', quantity: 12 },
                { product_id: 'SKU-7', quantity: 3 },
            ]),
        ).toEqual([
            { sku: 1001, quantity: 12 },
            { sku: 'SKU-7', quantity: 3 },
        ]);
    });

    it('drops items without a positive whole quantity', () => {
        expect(buildDraftItems([{ product_id: '1', quantity: 0 }, { product_id: '2', quantity: 1.5 }])).toEqual([]);
    });

    it('merges strategy fields into the payload', () => {
        const typeDirect = catalog[2];
        if (!typeDirect) throw new Error('catalog too short');
        expect(buildDraftPayload(typeDirect, [{ sku: 1001, quantity: 12 }], 77)).toEqual({
            items: [{ sku: 1001, quantity: 12 }],
            type: 'DIRECT',
        });
    });

    it('carries the drop-off point only for drop-off shapes', () => {
        const planned = planStrategies(catalog, { preference: null, dropOffWarehouseId: 77 });
        const drop = planned.find(s => s.name === 'type_crossdock_drop');
        if (!drop) throw new Error('missing drop-off shape');
        expect(buildDraftPayload(drop, [{ sku: 1001, quantity: 12 }], 77)).toEqual({
            items: [{ sku: 1001, quantity: 12 }],
            type: 'CROSSDOCK',
            drop_off_point_warehouse_id: 77,
        });
    });
});
