export interface ApiResponse<T> {
  success: boolean;
  message: string;
  data: T;
}

export interface PageMeta {
  page: number;
  limit: number;
  total: number;
  total_pages: number;
}

export interface Paginated<T> {
  items: T[];
  meta: PageMeta;
}
