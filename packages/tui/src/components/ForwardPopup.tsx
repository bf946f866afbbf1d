import { Box, Text } from "ink";
import React from "react";
import {
  FORWARD_FIELDS,
  FORWARD_FIELD_LABELS,
  type ForwardDraft,
  isFieldLocked,
  isFieldValid
} from "../state/forward-draft";
import { Popup } from "./Popup";

interface ForwardPopupProps {
  draft: ForwardDraft;
  columns: number;
  rows: number;
}

export function ForwardPopup({ draft, columns, rows }: ForwardPopupProps) {
  return (
    <Popup
      title="New SSH Forward"
      footer="Tab:Next  Enter:Create  Esc:Cancel"
      width={50}
      height={FORWARD_FIELDS.length + 6}
      columns={columns}
      rows={rows}
    >
      {FORWARD_FIELDS.map((field) => {
        const active = draft.activeField === field;
        const locked = isFieldLocked(field, draft.locked);
        const value = draft[field];
        const valid = isFieldValid(draft, field);

        return (
          <Box key={field}>
            <Text color={active ? "cyan" : "gray"}>
              {active ? "▸ " : "  "}
              {FORWARD_FIELD_LABELS[field].padEnd(13)}
            </Text>
            <Text color={locked ? "gray" : valid ? "white" : "red"}>
              {value}
            </Text>
            {active && <Text inverse> </Text>}
            {locked && <Text color="gray"> (locked)</Text>}
          </Box>
        );
      })}
    </Popup>
  );
}
