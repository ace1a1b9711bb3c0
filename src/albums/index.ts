export { findAlbums, listAlbumFiles } from './scanner.js';
export {
  writeListing,
  renderListingJson,
  renderListingScript,
  listingPathFor,
  listingScriptPathFor,
  type WrittenListing
} from './listing.js';
export { indexAlbums, type IndexOptions } from './indexer.js';
