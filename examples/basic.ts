/**
 * Basic example: create an org unit with two employees, then rename the unit.
 *
 * Expects an organisation registry at BATCH_UPLOADER_BASE_URL (default
 * http://localhost:5000).
 */

import { randomUUID } from 'node:crypto';
import {
  createLoggerProgressReporter,
  createOrganisationClient,
  type OrganisationObject,
} from '@batch-uploader/core';

const unitUuid = randomUUID();

const objects: OrganisationObject[] = [
  { type: 'org_unit', uuid: unitUuid, name: 'Finance', validity: { from: '2024-01-01' } },
  { type: 'employee', uuid: randomUUID(), givenname: 'Ada', surname: 'Lovelace' },
  { type: 'employee', uuid: randomUUID(), givenname: 'Alan', surname: 'Turing' },
];

const client = createOrganisationClient({ chunkSize: 50 });

await client.withSession(async () => {
  const created = await client.upload(objects, { progress: createLoggerProgressReporter() });
  console.log(`Created ${created.length} objects`);

  const edited = await client.edit([
    { type: 'org_unit', uuid: unitUuid, name: 'Finance & Accounting' },
  ]);
  console.log(`Edited ${edited.length} objects`);
});
