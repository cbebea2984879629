/**
 * Bank Page Bodies
 * Layer: Interfaces (HTTP)
 *
 * Pure functions from data to SafeHtml; the page controller wraps them in
 * layout(). Deletes are POST forms so no state changes on a GET.
 */
import type { Bank } from '@domain/entities/Bank';
import { BANK_FIELD_MAX_LENGTH } from '@application/validation/bankSchemas';

import { html, type SafeHtml } from './html';

function deleteButton(bank: Bank): SafeHtml {
  return html`<form method="post" action="/banks/${bank.id}/delete">
  <button type="submit">Delete</button>
</form>`;
}

export function bankListView(banks: Bank[]): SafeHtml {
  if (banks.length === 0) {
    return html`<p>No banks yet. <a href="/banks/new">Add the first one</a>.</p>`;
  }

  return html`<table>
  <thead>
    <tr><th>ID</th><th>Name</th><th>Location</th><th></th></tr>
  </thead>
  <tbody>
    ${banks.map(
      (bank) => html`<tr>
      <td>${bank.id}</td>
      <td><a href="/banks/${bank.id}">${bank.name}</a></td>
      <td>${bank.location}</td>
      <td><a href="/banks/${bank.id}/edit">Edit</a> ${deleteButton(bank)}</td>
    </tr>`,
    )}
  </tbody>
</table>`;
}

export function bankDetailView(bank: Bank): SafeHtml {
  return html`<dl>
  <dt>ID</dt><dd>${bank.id}</dd>
  <dt>Name</dt><dd>${bank.name}</dd>
  <dt>Location</dt><dd>${bank.location}</dd>
</dl>
<p><a href="/banks/${bank.id}/edit">Edit</a></p>
${deleteButton(bank)}
<p><a href="/banks">Back to list</a></p>`;
}

function bankFields(values: { name: string; location: string }): SafeHtml {
  return html`<label>Name
    <input name="name" value="${values.name}" maxlength="${BANK_FIELD_MAX_LENGTH}" required />
  </label>
  <label>Location
    <input name="location" value="${values.location}" maxlength="${BANK_FIELD_MAX_LENGTH}" required />
  </label>`;
}

export function newBankFormView(): SafeHtml {
  return html`<form method="post" action="/banks/new">
  ${bankFields({ name: '', location: '' })}
  <button type="submit">Create</button>
</form>
<p><a href="/banks">Cancel</a></p>`;
}

export function editBankFormView(bank: Bank): SafeHtml {
  return html`<form method="post" action="/banks/${bank.id}/edit">
  ${bankFields(bank)}
  <button type="submit">Save</button>
</form>
<p><a href="/banks/${bank.id}">Cancel</a></p>`;
}

export function errorView(message: string): SafeHtml {
  return html`<p>${message}</p>
<p><a href="/banks">Back to list</a></p>`;
}
