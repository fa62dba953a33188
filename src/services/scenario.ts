import type {
  ContentType,
  DatabaseDescriptor,
  PermissionFlags,
  WellKnownResources,
} from '../core/types.js';
import { solidColorPng } from '../utils/png.js';

export interface FixtureSpec {
  contentType: ContentType;
  database: DatabaseDescriptor;
  filename: string;
  mediaType: string;
  metadata: Record<string, string>;
  generate(): Buffer;
}

const TEXT_FIELD = 'TEXT';

export const FIXTURE_SPECS: readonly FixtureSpec[] = [
  {
    contentType: 'image',
    database: {
      name: 'test_image_db',
      content_type: 'image',
      custom_fields: [{ name: 'description', type: TEXT_FIELD }],
    },
    filename: 'dummy.png',
    mediaType: 'image/png',
    metadata: { description: 'This is a test image' },
    generate: () => solidColorPng(100, 100, [255, 0, 0]),
  },
  {
    contentType: 'audio',
    database: {
      name: 'test_audio_db',
      content_type: 'audio',
      custom_fields: [{ name: 'artist', type: TEXT_FIELD }],
    },
    filename: 'dummy.mp3',
    mediaType: 'audio/mpeg',
    metadata: { artist: 'Test Artist' },
    generate: () => Buffer.from('dummy mp3 data'),
  },
  {
    contentType: 'file',
    database: {
      name: 'test_file_db',
      content_type: 'file',
      custom_fields: [{ name: 'description', type: TEXT_FIELD }],
    },
    filename: 'dummy.txt',
    mediaType: 'text/plain',
    metadata: { description: 'This is a test file' },
    generate: () => Buffer.from('dummy file data'),
  },
];

// Created only if the server wrongly accepts the post-revocation create
export const FORBIDDEN_PROBE_DATABASE: DatabaseDescriptor = {
  name: 'test_db_2',
  content_type: 'image',
  custom_fields: [{ name: 'description', type: TEXT_FIELD }],
};

export const INITIAL_USER_PERMISSIONS: PermissionFlags = {
  can_view: true,
  can_create: true,
  can_edit: true,
  can_delete: true,
  is_admin: false,
};

export const REVOKED_PERMISSIONS = { can_create: false, can_delete: false } as const;

export function wellKnownResources(testUsername: string): WellKnownResources {
  return {
    databases: [...FIXTURE_SPECS.map((s) => s.database.name), FORBIDDEN_PROBE_DATABASE.name],
    usernames: [testUsername],
  };
}
