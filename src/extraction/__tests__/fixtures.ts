/**
 * Page text shared by the parser and pipeline tests. All names and numbers are made up.
 */

export const ARP_TEXT = [
  'APPLICATION FOR REVIEW OF PLACEMENT',
  'Cause No. 24-001234',
  '1. WARD',
  'Name: Jane Ann Park',
  'Address: 12 Oak St',
  'City/State/Zip: Austin, TX 78701',
  'Phone: 512-555-0100',
  'DOB: 3/4/1950',
  '2. GUARDIAN(s)',
  'Name(s): Randal Michael Pack and Lisa Park',
  'Address: 44 Elm Rd',
  'City/State/Zip: Austin, TX 78702',
  'Phone: 512-555-0142 / 512-555-0199',
  'Email: rpark@example.com',
  'DOB: 7-22-60/3-23-56',
  'Relationship: Son',
  'G2 Relationship: Daughter',
  'Both reside at the same address',
  '3. VISIT',
].join('\n');

export const ARP_TEXT_PRE_ANCHOR = [
  '1. WARD',
  'Name: Tom Hall',
  '2. GUARDIAN(s)',
  'Derek Hall',
  'Name(s): Karen Hall',
  'Phone: 512-555-0142 / 512-555-0199',
  'Relationship: Mother / Father',
].join('\n');

export const ORDER_TEXT = [
  'IN THE PROBATE COURT',
  'No. C-1-PB-24-001234',
  'In the Guardianship of',
  'Jane Ann Park',
  'In Probate Court No. 1',
  'ORDER APPOINTING GUARDIAN',
  'Signed on July 3, 2025',
  'Judge Presiding',
].join('\n');
