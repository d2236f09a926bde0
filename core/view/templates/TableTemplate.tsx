/**
 * TableTemplate - Default HTML template
 *
 * Renders:
 * - Table actions above the table
 * - Caption, headings with sort links, one row per record
 * - Row actions in a trailing column
 * - Page links below the table
 */

import { isValidElement } from 'react';
import type { ReactNode } from 'react';
import type { ResolvedAction } from '../../components/Action.js';
import type { PageLink, PaginationMeta } from '../../pagination/types.js';
import { formatDisplayValue } from '../format.js';
import type { Heading, TableTemplateProps } from '../types.js';

function renderValue(value: unknown): ReactNode {
  return isValidElement(value) ? value : formatDisplayValue(value);
}

const ActionLink = ({ action }: { action: ResolvedAction }) => (
  <a href={action.href} className={`action action-${action.key}`} data-confirm={action.confirm ?? undefined}>
    {action.label}
  </a>
);

const HeadingCell = ({ heading }: { heading: Heading }) => {
  const ariaSort = heading.active ? (heading.direction === 'desc' ? 'descending' : 'ascending') : undefined;
  return (
    <th aria-sort={ariaSort}>
      {heading.href !== null ? <a href={heading.href}>{heading.label}</a> : heading.label}
    </th>
  );
};

const PageItem = ({ link }: { link: PageLink }) => {
  if (link.type === 'gap') {
    return <li className="gap">…</li>;
  }
  if (link.active) {
    return (
      <li className="active">
        <span>{link.page}</span>
      </li>
    );
  }
  return (
    <li>
      <a href={link.url}>{link.page}</a>
    </li>
  );
};

const Pagination = ({ meta }: { meta: PaginationMeta }) => (
  <nav className="pagination">
    <p>
      Showing {meta.from} to {meta.to} of {meta.total}
    </p>
    <ul>
      {meta.previousUrl !== null && (
        <li>
          <a href={meta.previousUrl} rel="prev">
            Previous
          </a>
        </li>
      )}
      {meta.links.map((link, index) => (
        <PageItem key={index} link={link} />
      ))}
      {meta.nextUrl !== null && (
        <li>
          <a href={meta.nextUrl} rel="next">
            Next
          </a>
        </li>
      )}
    </ul>
  </nav>
);

export const TableTemplate = ({ data }: TableTemplateProps) => {
  const hasRowActions = data.rows.some((row) => row.getActions().length > 0);
  const columnCount = data.headings.length + (hasRowActions ? 1 : 0);

  return (
    <div className={`carpenter carpenter-${data.name}`}>
      {data.actions.length > 0 && (
        <div className="table-actions">
          {data.actions.map((action) => (
            <ActionLink key={action.key} action={action} />
          ))}
        </div>
      )}
      <table>
        {data.title !== null && <caption>{data.title}</caption>}
        <thead>
          <tr>
            {data.headings.map((heading) => (
              <HeadingCell key={heading.key} heading={heading} />
            ))}
            {hasRowActions && <th />}
          </tr>
        </thead>
        <tbody>
          {data.rows.length === 0 ? (
            <tr>
              <td colSpan={columnCount}>No records found</td>
            </tr>
          ) : (
            data.rows.map((row) => (
              <tr key={String(row.id)} data-id={row.id}>
                {data.headings.map((heading) => (
                  <td key={heading.key}>{renderValue(row.cell(heading.key)?.value)}</td>
                ))}
                {hasRowActions && (
                  <td className="row-actions">
                    {row.getActions().map((action) => (
                      <ActionLink key={action.key} action={action} />
                    ))}
                  </td>
                )}
              </tr>
            ))
          )}
        </tbody>
      </table>
      {data.pagination !== null && data.pagination.hasPages && <Pagination meta={data.pagination} />}
    </div>
  );
};
