import { describe, it, expect } from '@jest/globals';
import { toEnumMember, toIdentifier, toModuleName, toSnakeCase, toTypeIdentifier, toTypeName } from './naming.js';

describe('naming', () => {
  it('should split camel case names and acronyms into snake case', () => {
    expect(toSnakeCase('DOMStorage')).toBe('dom_storage');
    expect(toSnakeCase('backendNodeId')).toBe('backend_node_id');
    expect(toSnakeCase('TargetID')).toBe('target_id');
    expect(toSnakeCase('back-forward')).toBe('back_forward');
  });

  it('should convert protocol names to lower camel case identifiers', () => {
    expect(toIdentifier('DOMStorage')).toBe('domStorage');
    expect(toIdentifier('URL')).toBe('url');
    expect(toIdentifier('outerHTML')).toBe('outerHtml');
    expect(toIdentifier('getFrameTree')).toBe('getFrameTree');
  });

  it('should never produce reserved words or leading digits', () => {
    expect(toIdentifier('delete')).toBe('delete_');
    expect(toIdentifier('new')).toBe('new_');
    expect(toIdentifier('eval')).toBe('eval_');
    expect(toIdentifier('2d')).toBe('_2d');
  });

  it('should convert enum values to upper snake case members', () => {
    expect(toEnumMember('Failed')).toBe('FAILED');
    expect(toEnumMember('BackForwardCacheRestore')).toBe('BACK_FORWARD_CACHE_RESTORE');
    expect(toEnumMember('back-forward')).toBe('BACK_FORWARD');
    expect(toEnumMember('address_bar')).toBe('ADDRESS_BAR');
    expect(toEnumMember('2d')).toBe('_2D');
  });

  it('should build type names from event names', () => {
    expect(toTypeName('frameNavigated')).toBe('FrameNavigated');
    expect(toTypeName('detached')).toBe('Detached');
  });

  it('should keep declared type ids', () => {
    expect(toTypeIdentifier('TargetID')).toBe('TargetID');
    expect(toTypeIdentifier('Frame')).toBe('Frame');
  });

  it('should keep module names clear of the shared units', () => {
    expect(toModuleName('DOM')).toBe('dom');
    expect(toModuleName('IndexedDB')).toBe('indexedDb');
    expect(toModuleName('Util')).toBe('util_');
    expect(toModuleName('Index')).toBe('index_');
  });

  it('should be stable between calls', () => {
    expect(toIdentifier('CSSStyleSheetHeader')).toBe(toIdentifier('CSSStyleSheetHeader'));
    expect(toIdentifier('CSSStyleSheetHeader')).toBe('cssStyleSheetHeader');
  });
});
