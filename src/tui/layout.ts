export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export const TAB_BAR_HEIGHT = 3;
export const FOOTER_HEIGHT = 1;
// border (2) + month title (1) + weekday header (1) + up to six weeks (6)
export const CALENDAR_HEIGHT = 10;

export interface ScreenLayout {
  tabs: Rect;
  content: Rect;
  list: Rect;
  calendar: Rect;
  detail: Rect;
  footerY: number;
}

/**
 * Split the terminal (1-based coordinates) into tab bar, content and footer. The
 * content area holds the list on the left third and calendar above task detail on the right.
 */
export function computeLayout(width: number, height: number): ScreenLayout {
  const w = Math.max(20, width);
  const h = Math.max(TAB_BAR_HEIGHT + FOOTER_HEIGHT + 4, height);

  const tabs: Rect = { x: 1, y: 1, width: w, height: TAB_BAR_HEIGHT };
  const content: Rect = { x: 1, y: TAB_BAR_HEIGHT + 1, width: w, height: h - TAB_BAR_HEIGHT - FOOTER_HEIGHT };

  const listWidth = Math.max(10, Math.floor(w / 3));
  const rightWidth = w - listWidth;
  const calendarHeight = Math.min(CALENDAR_HEIGHT, Math.max(3, Math.floor(content.height / 2)));

  return {
    tabs,
    content,
    list: { x: 1, y: content.y, width: listWidth, height: content.height },
    calendar: { x: listWidth + 1, y: content.y, width: rightWidth, height: calendarHeight },
    detail: {
      x: listWidth + 1,
      y: content.y + calendarHeight,
      width: rightWidth,
      height: content.height - calendarHeight,
    },
    footerY: h,
  };
}

export function centeredRect(percentX: number, percentY: number, area: Rect): Rect {
  const width = Math.max(1, Math.floor((area.width * percentX) / 100));
  const height = Math.max(1, Math.floor((area.height * percentY) / 100));
  return {
    x: area.x + Math.floor((area.width - width) / 2),
    y: area.y + Math.floor((area.height - height) / 2),
    width,
    height,
  };
}

export function innerRect(rect: Rect): Rect {
  return {
    x: rect.x + 1,
    y: rect.y + 1,
    width: Math.max(0, rect.width - 2),
    height: Math.max(0, rect.height - 2),
  };
}

/** First visible row so that `selected` stays inside a viewport of `visible` rows. */
export function scrollOffsetFor(selected: number | null, visible: number): number {
  if (selected === null || visible <= 0) return 0;
  return Math.max(0, selected - visible + 1);
}
