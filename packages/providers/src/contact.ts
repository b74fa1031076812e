/**
 * Deep link that adds the node to a MeshCore client's contacts.
 */
export function buildContactUrl(name: string, publicKey: string): string {
  return `meshcore://contact/add?name=${encodeURIComponent(name)}&public_key=${publicKey.toUpperCase()}&type=2`;
}
