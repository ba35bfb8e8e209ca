export type LinkAction = 'create' | 'list' | 'delete';

export interface Link {
  rel: string;
  href: string;
  action: 'GET' | 'DELETE';
  type: string;
}

/**
 * Hypermedia links attached to QR code responses. `view` points at the public
 * download URL, `delete` at the API resource.
 */
export function generateLinks(
  action: LinkAction,
  filename: string,
  baseUrl: string,
  downloadUrl: string,
): Link[] {
  const links: Link[] = [];

  if (action === 'create' || action === 'list') {
    links.push({ rel: 'view', href: downloadUrl, action: 'GET', type: 'image/png' });
  }

  links.push({
    rel: 'delete',
    href: `${baseUrl}/qr-codes/${filename}`,
    action: 'DELETE',
    type: 'application/json',
  });

  return links;
}
