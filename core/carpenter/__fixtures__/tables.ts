/**
 * Tables registered by Carpenter.loadTables() in tests
 */

import type { Carpenter } from '../Carpenter.js';

const products = [
  { id: 'p-1', name: 'Bolt', price: 0.25 },
  { id: 'p-2', name: 'Hinge, brass', price: 3.5 },
  { id: 'p-3', name: 'Nut', price: 0.1 },
];

export default function registerTables(carpenter: Carpenter): void {
  carpenter.add('products', (table) => {
    table.setTitle('Products');
    table.column('name');
    table.column('price').setPresenter((value) => Number(value).toFixed(2));
    table.data(products);
  });
}
