import test from 'node:test';
import assert from 'node:assert/strict';
import {
  extractCompanyName,
  extractContactInfo,
  extractEmails,
  extractName,
  extractPhone,
  formatPhone,
} from '../contactExtractor';

test('formats 10 and 11 digit phone numbers', () => {
  assert.equal(formatPhone('617-555-0142'), '(617) 555-0142');
  assert.equal(formatPhone('1 617 555 0142'), '+1 (617) 555-0142');
  assert.equal(formatPhone('555-0142'), undefined);
  assert.equal(formatPhone('2 617 555 0142'), undefined);
});

test('keeps only consumer mailbox emails, lowercased', () => {
  assert.deepEqual(extractEmails('Reach me at Jane.Doe@Gmail.com or jd@company.com'), ['jane.doe@gmail.com']);
  assert.deepEqual(extractEmails('no email here'), []);
});

test('extracts the first phone in normalized form', () => {
  assert.equal(extractPhone('Call (617) 555-0142 today'), '(617) 555-0142');
  assert.equal(extractPhone('Text +1 617.555.0142'), '+1 (617) 555-0142');
  assert.equal(extractPhone('Lot 1234 sold'), undefined);
});

test('extracts first and last name from the title head', () => {
  assert.deepEqual(extractName('Jane Smith - Realtor at Bay Realty'), { firstName: 'Jane', lastName: 'Smith' });
  assert.deepEqual(extractName('Maria (@maria.homes)'), { firstName: 'Maria' });
  assert.deepEqual(extractName('realtor tips'), {});
  assert.deepEqual(extractName(''), {});
});

test('extracts a company ending in a real-estate suffix', () => {
  assert.equal(extractCompanyName('Jane works with Harbor View Realty in Boston'), 'Harbor View Realty');
  assert.equal(extractCompanyName('nothing relevant'), undefined);
});

test('builds a contact from title, snippet and link', () => {
  assert.deepEqual(
    extractContactInfo('Tom Baker | Homes', 'Email tom.baker@yahoo.com or call 508-555-0199', 'https://www.facebook.com/tombaker'),
    {
      firstName: 'Tom',
      lastName: 'Baker',
      companyName: undefined,
      websiteUrl: 'https://www.facebook.com/tombaker',
      email: 'tom.baker@yahoo.com',
      phone: '(508) 555-0199',
    },
  );
});
