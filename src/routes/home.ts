/**
 * Home Routes
 *
 * Text, HTML and JSON demo pages.
 */

import type { Handler, Router } from '../../framework/mod.ts';

export interface Product {
  id: number;
  name: string;
  price: number;
}

export const EXAMPLE_PRODUCT: Readonly<Product> = { id: 101, name: 'Example Gadget', price: 19.99 };

/**
 * Build `count` products priced between 1.00 and 100.00
 */
export function generateProducts(count: number, random: () => number = Math.random): Product[] {
  return Array.from({ length: count }, (_, index) => ({
    id: index + 1,
    name: `Product ${index + 1}`,
    price: Math.round((1 + random() * 99) * 100) / 100,
  }));
}

/**
 * Register the home routes on a router
 */
export function registerHomeRoutes(router: Router): void {
  router.get('/', (_req, res) => {
    res.text('Welcome to Ferry!');
  });

  router.get('/hello', (_req, res) => {
    res.html('<h1>Hello, Ferry!</h1><p>This is an HTML response from the /hello route.</p>');
  });

  router.get('/status', (_req, res) => {
    res.json({ title: 'Server Status', message: 'Ferry is operational and ready!' });
  });

  router.get('/product/1', (_req, res) => {
    res.json(EXAMPLE_PRODUCT);
  });

  router.get('/json', (_req, res) => {
    res.json(generateProducts(15));
  });

  router.get('/info', createInfoHandler(router));
}

/**
 * Index page listing every GET route and static mount the router knows at
 * request time
 */
export function createInfoHandler(router: Router): Handler {
  return (_req, res) => {
    const links = router
      .getRoutes()
      .filter((route) => route.method === 'GET')
      .map((route) => route.path)
      .sort()
      .map((path) => `      <li><a href="${escapeHtml(path)}">GET ${escapeHtml(path)}</a></li>`);

    const mounts = router
      .getStaticMounts()
      .map(
        (mount) =>
          `      <li><a href="${escapeHtml(mount.prefix)}/">Static files at ${escapeHtml(mount.prefix)}</a></li>`
      );

    res.html(
      [
        '<!DOCTYPE html>',
        '<html lang="en">',
        '  <head>',
        '    <meta charset="UTF-8" />',
        '    <title>Ferry Server Info</title>',
        '  </head>',
        '  <body>',
        '    <h1>Ferry Server Info</h1>',
        '    <p>Available Routes:</p>',
        '    <ul>',
        ...links,
        ...mounts,
        '    </ul>',
        '  </body>',
        '</html>',
      ].join('\n')
    );
  };
}

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}
